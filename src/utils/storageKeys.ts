/**
 * Centralized storage keys for the DRO viewer.
 *
 * Everything the app persists in localStorage is named here.
 */

/** Last analyst selection (models, parameter, voxel, figure size). */
export const SELECTION_STORAGE_KEY = 'dro-viewer:selection:v1';

/** Debug logging override ('1' on, '0' off). */
export const DEBUG_STORAGE_KEY = 'dro-viewer:debug';
