import { defineConfig } from 'vite';

export default defineConfig({
  publicDir: 'public',
  server: {
    port: 5174,
  },
  build: {
    outDir: 'dist',
    target: 'es2022',
  },
});
