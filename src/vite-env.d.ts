/// <reference types="vite/client" />

/** Build timestamp, injected by vite.config.ts */
declare const __APP_VERSION__: string;
/** Where the dashboard fetches its CSV from (DATASET_URL at dev-server start) */
declare const __DATASET_URL__: string;
