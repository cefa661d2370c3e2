import { defineConfig } from 'vite';

export default defineConfig({
  define: {
    __APP_VERSION__: JSON.stringify(
      new Date().toISOString().replace(/T/, ' ').replace(/\.\d+Z$/, '') + ' UTC'
    ),
    __DATASET_URL__: JSON.stringify(process.env.DATASET_URL ?? '/data/laliga_player_stats.csv'),
  },
  server: {
    port: 3000,
    open: true,
  },
  build: {
    outDir: 'dist/web',
  },
});
