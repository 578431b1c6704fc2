/**
 * Debug logging for the DRO viewer.
 *
 * On by default in DEV builds, opt-in otherwise. Override via localStorage:
 *   localStorage.setItem('dro-viewer:debug', '1') // force on
 *   localStorage.setItem('dro-viewer:debug', '0') // force off
 */

import { DEBUG_STORAGE_KEY } from './storageKeys';

export function isDebugDroEnabled(): boolean {
  if (typeof window === 'undefined') return false;

  try {
    const v = window.localStorage.getItem(DEBUG_STORAGE_KEY);
    if (v === '1') return true;
    if (v === '0') return false;
    return !!import.meta.env.DEV;
  } catch {
    return false;
  }
}

export function debugDroLog(step: string, details: Record<string, unknown>, enabled: boolean = isDebugDroEnabled()): void {
  if (!enabled) return;
  console.log(`[dro] ${step}`, details);
}

