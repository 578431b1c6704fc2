export const DEFAULT_FIGURE_SIZE = { width: 600, height: 400 } as const;

export const FIGURE_LIMITS = {
  WIDTH: { MIN: 200, MAX: 1600, STEP: 10 },
  HEIGHT: { MIN: 150, MAX: 1200, STEP: 10 },
} as const;

/** Voxels closer than this to an edge cannot be selected (room for the crosshair). */
export const VOXEL_MARGIN = 3;

/**
 * Crosshair arms, as [near, far] offsets from the centre voxel.
 * The centre and its direct neighbours are left untouched.
 */
export const CROSSHAIR = { NEAR: 2, FAR: 3 } as const;

export const PARAMETER_MAP_QUANTILE = 0.9;

/** Fixed color limit for the RSS panel. */
export const RSS_COLOR_LIMIT = 0.0005;

/** Observed-curve y-axis padding factor. */
export const CURVE_Y_PADDING = 1.1;

export const DEFAULT_DATASET_URL: string = import.meta.env.VITE_DRO_DATASET_URL || '/dro.json';
