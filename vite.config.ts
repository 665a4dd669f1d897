import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';
import { fileURLToPath } from 'node:url';

const frontendRoot = fileURLToPath(new URL('./src/frontend', import.meta.url));
const outDir = fileURLToPath(new URL('./public/dist', import.meta.url));

export default defineConfig({
  plugins: [react()],
  root: frontendRoot,
  base: '/dashboard/',
  build: {
    outDir,
    emptyOutDir: true,
    sourcemap: true,
  },
  server: {
    proxy: {
      '/api': 'http://localhost:3000',
    },
  },
});
