/// <reference types="vite/client" />

type ViteEnvString = string | undefined;

declare interface ImportMetaEnv {
  /** Dataset JSON fetched at startup (defaults to /dro.json). */
  readonly VITE_DRO_DATASET_URL: ViteEnvString;
}

declare interface ImportMeta {
  readonly env: ImportMetaEnv;
}
