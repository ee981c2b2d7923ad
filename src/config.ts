// config.ts
// Engine construction parameters, their defaults, and validation.

/** Pixel margins around the board. */
export interface BoardMargins {
  left: number;
  right: number;
  top: number;
  /** Includes the space kept free for the hand below the board. */
  bottom: number;
}

/** Fully resolved engine parameters. Times are in seconds. */
export interface EngineConfig {
  pixelWidth: number;
  pixelHeight: number;
  margins: BoardMargins;
  cellSize: number;
  /** Edge length of the square food block, in cells. */
  foodSize: number;
  tickInterval: number;
  /** Deadzone radius as a fraction of the cell size. */
  deadzoneFraction: number;
  /** Grace period without pointer samples before pausing. */
  signalLossWindow: number;
  maxCatchUpSteps: number;
  growthPerFood: number;
  eatFlashSeconds: number;
}

/** Partial engine parameters; margins may be overridden one side at a time. */
export type EngineConfigInput = Partial<Omit<EngineConfig, 'margins'>> & {
  margins?: Partial<BoardMargins>;
};

/** Smallest board edge the geometry will produce. */
export const MIN_GRID_CELLS = 8;

/** Margin below the board reserved so the tracked hand stays in frame. */
export const HAND_SPACE_BOTTOM = 150;

export const ENGINE_DEFAULTS: EngineConfig = {
  pixelWidth: 1280,
  pixelHeight: 720,
  margins: { left: 70, right: 70, top: 70, bottom: 70 + HAND_SPACE_BOTTOM },
  cellSize: 26,
  foodSize: 3,
  tickInterval: 0.12,
  deadzoneFraction: 0.55,
  signalLossWindow: 0.6,
  maxCatchUpSteps: 3,
  growthPerFood: 2,
  eatFlashSeconds: 0.35
};

/** Raised when construction parameters contradict each other. */
export class EngineConfigError extends Error {
  /** Offending parameter name. */
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid engine config: ${field} ${reason}.`);
    this.name = 'EngineConfigError';
    this.field = field;
  }
}

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new EngineConfigError(field, `must be a finite number (got ${String(value)})`);
  }
}

function requireAtLeast(field: string, value: number, min: number, exclusive = false): void {
  requireFinite(field, value);
  if (exclusive ? value <= min : value < min) {
    throw new EngineConfigError(field, `must be ${exclusive ? 'greater than' : 'at least'} ${min} (got ${value})`);
  }
}

function requireInteger(field: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new EngineConfigError(field, `must be an integer (got ${value})`);
  }
}

/**
 * Fill defaults and reject contradictory parameters.
 * @param input - Partial overrides.
 * @returns Resolved configuration.
 * @throws EngineConfigError when a value is out of range.
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const d = ENGINE_DEFAULTS;
  const m = input.margins ?? {};
  const margins: BoardMargins = {
    left: m.left ?? d.margins.left,
    right: m.right ?? d.margins.right,
    top: m.top ?? d.margins.top,
    bottom: m.bottom ?? d.margins.bottom
  };
  const cfg: EngineConfig = {
    pixelWidth: input.pixelWidth ?? d.pixelWidth,
    pixelHeight: input.pixelHeight ?? d.pixelHeight,
    margins,
    cellSize: input.cellSize ?? d.cellSize,
    foodSize: input.foodSize ?? d.foodSize,
    tickInterval: input.tickInterval ?? d.tickInterval,
    deadzoneFraction: input.deadzoneFraction ?? d.deadzoneFraction,
    signalLossWindow: input.signalLossWindow ?? d.signalLossWindow,
    maxCatchUpSteps: input.maxCatchUpSteps ?? d.maxCatchUpSteps,
    growthPerFood: input.growthPerFood ?? d.growthPerFood,
    eatFlashSeconds: input.eatFlashSeconds ?? d.eatFlashSeconds
  };

  requireAtLeast('pixelWidth', cfg.pixelWidth, 0, true);
  requireAtLeast('pixelHeight', cfg.pixelHeight, 0, true);
  for (const side of ['left', 'right', 'top', 'bottom'] as const) {
    requireAtLeast(`margins.${side}`, margins[side], 0);
  }
  requireAtLeast('cellSize', cfg.cellSize, 0, true);
  requireAtLeast('foodSize', cfg.foodSize, 1);
  requireInteger('foodSize', cfg.foodSize);
  if (cfg.foodSize > MIN_GRID_CELLS) {
    throw new EngineConfigError('foodSize', `must not exceed the minimum board edge of ${MIN_GRID_CELLS} cells`);
  }
  requireAtLeast('tickInterval', cfg.tickInterval, 0, true);
  requireAtLeast('deadzoneFraction', cfg.deadzoneFraction, 0);
  requireAtLeast('signalLossWindow', cfg.signalLossWindow, 0);
  requireAtLeast('maxCatchUpSteps', cfg.maxCatchUpSteps, 1);
  requireInteger('maxCatchUpSteps', cfg.maxCatchUpSteps);
  requireAtLeast('growthPerFood', cfg.growthPerFood, 0);
  requireInteger('growthPerFood', cfg.growthPerFood);
  requireAtLeast('eatFlashSeconds', cfg.eatFlashSeconds, 0);
  return cfg;
}
