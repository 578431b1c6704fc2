import { useRef } from 'react';
import { Activity, AlertCircle, Download, FlaskConical, FolderOpen, Loader2 } from 'lucide-react';
import { useDroDataset } from './hooks/useDroDataset';
import { DroWorkspace } from './components/DroWorkspace';
import { DEFAULT_MODEL_REGISTRY } from './utils/dro/modelRegistry';
import { serializeDataset } from './utils/dro/loadDataset';
import { DEFAULT_DATASET_URL } from './utils/constants';
import type { Dataset, ModelRegistry } from './types/dro';

interface AppProps {
  datasetUrl?: string | null;
  registry?: ModelRegistry;
}

function downloadDataset(dataset: Dataset) {
  const blob = new Blob([JSON.stringify(serializeDataset(dataset))], { type: 'application/json' });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = 'dro.json';
  a.click();
  URL.revokeObjectURL(url);
}

function App({ datasetUrl = DEFAULT_DATASET_URL, registry = DEFAULT_MODEL_REGISTRY }: AppProps) {
  const { dataset, source, loading, error, loadFile, loadSynthetic } = useDroDataset(datasetUrl, registry);
  const fileInputRef = useRef<HTMLInputElement>(null);

  const fileInput = (
    <input
      ref={fileInputRef}
      type="file"
      accept="application/json,.json"
      className="hidden"
      data-testid="dataset-file-input"
      onChange={(e) => {
        const file = e.target.files?.[0];
        if (file) void loadFile(file);
        e.target.value = '';
      }}
    />
  );

  const sourceButtons = (
    <div className="flex items-center gap-2">
      <button
        onClick={() => fileInputRef.current?.click()}
        className="flex items-center gap-2 px-3 py-1.5 rounded-lg text-sm bg-[var(--bg-tertiary)] hover:bg-[var(--border-color)] text-[var(--text-primary)] transition-colors"
      >
        <FolderOpen className="w-4 h-4" />
        Open dataset
      </button>
      <button
        onClick={loadSynthetic}
        className="flex items-center gap-2 px-3 py-1.5 rounded-lg text-sm bg-[var(--bg-tertiary)] hover:bg-[var(--border-color)] text-[var(--text-primary)] transition-colors"
      >
        <FlaskConical className="w-4 h-4" />
        Synthetic DRO
      </button>
    </div>
  );

  // Loading state
  if (loading) {
    return (
      <div className="h-screen flex items-center justify-center bg-[var(--bg-primary)]">
        <div className="flex flex-col items-center gap-4">
          <Loader2 className="w-8 h-8 text-[var(--accent)] animate-spin" />
          <p className="text-[var(--text-secondary)]">Loading dataset...</p>
        </div>
      </div>
    );
  }

  // Error / empty state
  if (!dataset) {
    return (
      <div className="h-screen flex items-center justify-center bg-[var(--bg-primary)]">
        {fileInput}
        <div className="flex flex-col items-center gap-4 max-w-md text-center">
          {error ? (
            <>
              <AlertCircle className="w-12 h-12 text-red-500" />
              <h2 className="text-xl font-semibold">Failed to Load</h2>
              <p className="text-[var(--text-secondary)]">{error}</p>
            </>
          ) : (
            <>
              <Activity className="w-12 h-12 text-[var(--text-secondary)]" />
              <p className="text-[var(--text-secondary)]">No dataset loaded</p>
            </>
          )}
          {sourceButtons}
        </div>
      </div>
    );
  }

  return (
    <div className="h-screen flex flex-col">
      {fileInput}
      <header className="flex items-center justify-between px-4 py-3 bg-[var(--bg-secondary)] border-b border-[var(--border-color)]">
        <div className="flex items-center gap-3">
          <div className="flex items-center gap-2">
            <Activity className="w-6 h-6 text-[var(--accent)]" />
            <h1 className="text-lg font-semibold">Fits on Digital Reference Object</h1>
          </div>
          <div className="text-sm text-[var(--text-secondary)] border-l border-[var(--border-color)] pl-3 ml-2">
            {dataset.nx}×{dataset.ny} voxels · {dataset.nt} time points{source === 'synthetic' ? ' · synthetic' : ''}
          </div>
        </div>
        <div className="flex items-center gap-2">
          {error && (
            <span className="flex items-center gap-1 text-xs text-red-400">
              <AlertCircle className="w-3.5 h-3.5" />
              {error}
            </span>
          )}
          {sourceButtons}
          <button
            onClick={() => downloadDataset(dataset)}
            className="p-1.5 rounded hover:bg-[var(--bg-tertiary)] text-[var(--text-secondary)] hover:text-[var(--text-primary)] transition-colors"
            title="Export dataset as JSON"
          >
            <Download className="w-4 h-4" />
          </button>
        </div>
      </header>

      <DroWorkspace dataset={dataset} registry={registry} />
    </div>
  );
}

export default App;
