/// <reference types="vite/client" />

interface ImportMetaEnv {
  /** `1` builds the bundle with browser clipboard access. */
  readonly VITE_UNSTABLE_CLIPBOARD_API?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
