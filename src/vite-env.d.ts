/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_ORIGIN?: string;
  readonly VITE_DEMO_WALLET?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
