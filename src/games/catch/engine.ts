/**
 * Catch the Block Engine: Pure Game Logic
 *
 * State, geometry, the per-phase transition table and the frame step.
 * Nothing here touches the terminal, timers or audio: side effects are
 * returned as `GameEffect`s for the loop to carry out.
 */

// ============================================================================
// Types
// ============================================================================

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Color {
  r: number;
  g: number;
  b: number;
}

export type Phase = 'menu' | 'playing' | 'gameOver';

export interface CatchState {
  phase: Phase;
  paddle: Rect;
  block: Rect;
  mistakes: number;
  catches: number;
}

export type InputEvent =
  | { type: 'close' }
  | { type: 'keyDown'; key: string }
  | { type: 'pointerDown'; x: number; y: number }
  | { type: 'pointerMove'; x: number; y: number };

export interface HeldKeys {
  left: boolean;
  right: boolean;
}

export interface FrameInput {
  events: InputEvent[];
  held: HeldKeys;
}

export type GameEffect =
  | { type: 'startMusic' }
  | { type: 'stopMusic' }
  | { type: 'caught'; catches: number }
  | { type: 'missed'; mistakes: number }
  | { type: 'gameOver'; catches: number; mistakes: number };

export interface Transition {
  state: CatchState;
  effects: GameEffect[];
}

export interface FrameResult extends Transition {
  exit: boolean;
}

/** Uniform random in [0, 1) */
export type Random = () => number;

// ============================================================================
// Constants
// ============================================================================

export const SCREEN_WIDTH = 800;
export const SCREEN_HEIGHT = 600;
export const PADDLE_WIDTH = 100;
export const PADDLE_HEIGHT = 20;
const PADDLE_BOTTOM_MARGIN = 10;
export const BLOCK_SIZE = 30;
export const PADDLE_SPEED = 10;
export const BLOCK_SPEED = 5;
export const MAX_MISTAKES = 5;
export const FRAME_DELAY_MS = 16;

const PLAY_BUTTON_WIDTH = 250;
const PLAY_BUTTON_HEIGHT = 100;

export const PLAY_BUTTON_RECT: Readonly<Rect> = {
  x: (SCREEN_WIDTH - PLAY_BUTTON_WIDTH) / 2,
  y: (SCREEN_HEIGHT - PLAY_BUTTON_HEIGHT) / 2,
  width: PLAY_BUTTON_WIDTH,
  height: PLAY_BUTTON_HEIGHT,
};

export const BACKGROUND_COLOR: Readonly<Color> = { r: 33, g: 33, b: 33 };
export const PADDLE_COLOR: Readonly<Color> = { r: 100, g: 180, b: 255 };
export const BLOCK_COLOR: Readonly<Color> = { r: 255, g: 220, b: 50 };

// ============================================================================
// Geometry
// ============================================================================

/**
 * Strict overlap test: rectangles that only share an edge do not intersect.
 */
export function intersects(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height;
}

/**
 * Half-open containment: the left and top edges are inside, the right and
 * bottom edges are not.
 */
export function pointInRect(point: Point, rect: Rect): boolean {
  return point.x >= rect.x &&
    point.x < rect.x + rect.width &&
    point.y >= rect.y &&
    point.y < rect.y + rect.height;
}

export function clampPaddle(paddle: Rect, screenWidth: number = SCREEN_WIDTH): Rect {
  const maxX = screenWidth - paddle.width;
  const x = Math.min(maxX, Math.max(0, paddle.x));
  return x === paddle.x ? paddle : { ...paddle, x };
}

// ============================================================================
// Entity Creation
// ============================================================================

export function createPaddle(): Rect {
  return {
    x: (SCREEN_WIDTH - PADDLE_WIDTH) / 2,
    y: SCREEN_HEIGHT - PADDLE_HEIGHT - PADDLE_BOTTOM_MARGIN,
    width: PADDLE_WIDTH,
    height: PADDLE_HEIGHT,
  };
}

/**
 * New block at the top of the screen, x in [0, SCREEN_WIDTH - BLOCK_SIZE)
 */
export function spawnBlock(random: Random): Rect {
  return {
    x: Math.floor(random() * (SCREEN_WIDTH - BLOCK_SIZE)),
    y: 0,
    width: BLOCK_SIZE,
    height: BLOCK_SIZE,
  };
}

export function createInitialState(random: Random = Math.random): CatchState {
  return {
    phase: 'menu',
    paddle: createPaddle(),
    block: spawnBlock(random),
    mistakes: 0,
    catches: 0,
  };
}

// ============================================================================
// Phase Handlers
// ============================================================================

interface PhaseHandler {
  onEvent: (state: CatchState, event: InputEvent) => Transition;
  update: (state: CatchState, held: HeldKeys, random: Random) => Transition;
}

function unchanged(state: CatchState): Transition {
  return { state, effects: [] };
}

export function menuOnEvent(state: CatchState, event: InputEvent): Transition {
  if (event.type === 'pointerDown' && pointInRect(event, PLAY_BUTTON_RECT)) {
    return {
      state: { ...state, phase: 'playing' },
      effects: [{ type: 'startMusic' }],
    };
  }
  return unchanged(state);
}

export function playingOnEvent(state: CatchState, event: InputEvent): Transition {
  if (event.type === 'pointerMove') {
    const x = event.x - state.paddle.width / 2;
    return unchanged({ ...state, paddle: { ...state.paddle, x } });
  }
  return unchanged(state);
}

/**
 * One physics step: keyboard nudge, clamp, gravity, catch, then miss.
 */
export function updatePlaying(state: CatchState, held: HeldKeys, random: Random): Transition {
  const effects: GameEffect[] = [];

  let paddleX = state.paddle.x;
  if (held.left) paddleX -= PADDLE_SPEED;
  if (held.right) paddleX += PADDLE_SPEED;
  const paddle = clampPaddle({ ...state.paddle, x: paddleX });

  let block: Rect = { ...state.block, y: state.block.y + BLOCK_SPEED };
  let { catches, mistakes } = state;
  let phase: Phase = state.phase;

  if (intersects(paddle, block)) {
    catches++;
    block = spawnBlock(random);
    effects.push({ type: 'caught', catches });
  }

  if (block.y > SCREEN_HEIGHT) {
    mistakes++;
    block = spawnBlock(random);
    effects.push({ type: 'missed', mistakes });

    if (mistakes >= MAX_MISTAKES) {
      phase = 'gameOver';
      effects.push({ type: 'gameOver', catches, mistakes });
      effects.push({ type: 'stopMusic' });
    }
  }

  return { state: { phase, paddle, block, mistakes, catches }, effects };
}

const phases: Record<Phase, PhaseHandler> = {
  menu: { onEvent: menuOnEvent, update: unchanged },
  playing: { onEvent: playingOnEvent, update: updatePlaying },
  gameOver: { onEvent: unchanged, update: unchanged },
};

// ============================================================================
// Frame Step
// ============================================================================

export function isExitEvent(event: InputEvent): boolean {
  return event.type === 'close' || (event.type === 'keyDown' && event.key === 'Escape');
}

/**
 * Advance the game by one frame. Events are applied in queue order; an exit
 * event stops the frame where it stands.
 */
export function stepFrame(state: CatchState, input: FrameInput, random: Random = Math.random): FrameResult {
  let current = state;
  const effects: GameEffect[] = [];

  for (const event of input.events) {
    if (isExitEvent(event)) {
      return { state: current, effects, exit: true };
    }
    const transition = phases[current.phase].onEvent(current, event);
    current = transition.state;
    effects.push(...transition.effects);
  }

  const transition = phases[current.phase].update(current, input.held, random);
  effects.push(...transition.effects);
  return { state: transition.state, effects, exit: false };
}
