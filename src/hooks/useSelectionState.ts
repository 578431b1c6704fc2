import { useState, useEffect, useCallback } from 'react';
import type { Dataset, ModelId, ModelRegistry, SelectionState } from '../types/dro';
import {
  createDefaultSelection,
  parseSelection,
  withFigureSize,
  withModels,
  withParam,
  withVoxel,
} from '../utils/dro/selection';
import { readLocalStorageJson, writeLocalStorageJson } from '../utils/persistence';
import { SELECTION_STORAGE_KEY } from '../utils/storageKeys';

function readPersistedSelection(dataset: Dataset, registry: ModelRegistry): SelectionState | null {
  return parseSelection(readLocalStorageJson(SELECTION_STORAGE_KEY), dataset, registry);
}

/**
 * Analyst selection for one dataset. Every update replaces exactly one field
 * and yields a new snapshot; the last snapshot is persisted so a reload resumes
 * at the same voxel.
 */
export function useSelectionState(dataset: Dataset, registry: ModelRegistry) {
  const [selection, setSelection] = useState<SelectionState>(
    () => readPersistedSelection(dataset, registry) ?? createDefaultSelection(dataset, registry)
  );

  // A different dataset may not accept the old voxel/parameter. The fresh
  // selection is also returned from this render, so callers never pair the new
  // dataset with the old voxel.
  const [prevDataset, setPrevDataset] = useState(dataset);
  let current = selection;
  if (prevDataset !== dataset) {
    current = readPersistedSelection(dataset, registry) ?? createDefaultSelection(dataset, registry);
    setPrevDataset(dataset);
    setSelection(current);
  }

  useEffect(() => {
    writeLocalStorageJson(SELECTION_STORAGE_KEY, selection);
  }, [selection]);

  const setModels = useCallback(
    (models: readonly ModelId[]) => {
      if (models.length === 0) return;
      setSelection((prev) => withModels(prev, models, registry));
    },
    [registry]
  );

  const toggleModel = useCallback(
    (model: ModelId) => {
      setSelection((prev) => {
        const next = prev.models.includes(model)
          ? prev.models.filter((m) => m !== model)
          : [...prev.models, model];
        // Keep at least one model selected.
        if (next.length === 0) return prev;
        return withModels(prev, next, registry);
      });
    },
    [registry]
  );

  const setParam = useCallback(
    (param: string) => {
      setSelection((prev) => withParam(prev, param, registry));
    },
    [registry]
  );

  const setVoxel = useCallback(
    (voxel: { x?: number; y?: number }) => {
      setSelection((prev) => withVoxel(prev, voxel, dataset));
    },
    [dataset]
  );

  const setFigureSize = useCallback((size: { width?: number; height?: number }) => {
    setSelection((prev) => withFigureSize(prev, size));
  }, []);

  const reset = useCallback(() => {
    setSelection(createDefaultSelection(dataset, registry));
  }, [dataset, registry]);

  return { selection: current, setModels, toggleModel, setParam, setVoxel, setFigureSize, reset };
}
