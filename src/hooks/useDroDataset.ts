import { useState, useEffect, useCallback, useRef } from 'react';
import type { Dataset, ModelRegistry } from '../types/dro';
import { loadDatasetFromUrl, parseDatasetJson } from '../utils/dro/loadDataset';
import { createSyntheticDro } from '../utils/dro/synthetic';
import { errorMessage } from '../utils/dro/errors';
import { debugDroLog } from '../utils/debugDro';

export type DatasetSource = 'url' | 'file' | 'synthetic';

export function useDroDataset(url: string | null, registry: ModelRegistry) {
  const [dataset, setDataset] = useState<Dataset | null>(null);
  const [source, setSource] = useState<DatasetSource | null>(null);
  const [loading, setLoading] = useState(url !== null);
  const [error, setError] = useState<string | null>(null);

  // Bumped by every load; a load whose id is no longer current drops its result.
  const loadIdRef = useRef(0);

  useEffect(() => {
    if (!url) {
      setLoading(false);
      return;
    }

    let mounted = true;
    const loadId = ++loadIdRef.current;
    const isCurrent = () => mounted && loadId === loadIdRef.current;

    async function load(datasetUrl: string) {
      try {
        setLoading(true);
        const data = await loadDatasetFromUrl(datasetUrl, registry);
        if (isCurrent()) {
          debugDroLog('dataset loaded', { url: datasetUrl, nx: data.nx, ny: data.ny, nt: data.nt });
          setDataset(data);
          setSource('url');
          setError(null);
        } else {
          debugDroLog('dataset load superseded', { url: datasetUrl });
        }
      } catch (err) {
        if (isCurrent()) {
          setError(errorMessage(err, 'Failed to load dataset'));
        }
      } finally {
        if (isCurrent()) {
          setLoading(false);
        }
      }
    }

    void load(url);
    return () => {
      mounted = false;
    };
  }, [url, registry]);

  const loadFile = useCallback(
    async (file: File) => {
      const loadId = ++loadIdRef.current;
      try {
        setLoading(true);
        const data = parseDatasetJson(await file.text(), registry);
        if (loadId !== loadIdRef.current) return;
        debugDroLog('dataset loaded', { file: file.name, nx: data.nx, ny: data.ny, nt: data.nt });
        setDataset(data);
        setSource('file');
        setError(null);
      } catch (err) {
        if (loadId === loadIdRef.current) {
          setError(errorMessage(err, 'Failed to read dataset file'));
        }
      } finally {
        if (loadId === loadIdRef.current) {
          setLoading(false);
        }
      }
    },
    [registry]
  );

  const loadSynthetic = useCallback(() => {
    loadIdRef.current++;
    try {
      const data = createSyntheticDro({ registry });
      debugDroLog('synthetic dataset created', { nx: data.nx, ny: data.ny, nt: data.nt });
      setDataset(data);
      setSource('synthetic');
      setError(null);
    } catch (err) {
      setError(errorMessage(err, 'Failed to create synthetic dataset'));
    } finally {
      setLoading(false);
    }
  }, [registry]);

  return { dataset, source, loading, error, loadFile, loadSynthetic };
}
