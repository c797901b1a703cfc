/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DEFAULT_SEARCH_TEXT?: string;
  readonly VITE_DEFAULT_SEARCH_PATTERN?: string;
  readonly VITE_ENABLE_SEARCH_TRACE?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
