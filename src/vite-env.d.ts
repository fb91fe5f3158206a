/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_URL?: string;
  readonly VITE_KEV_CSV_URL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
