import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vite';
import react from '@vitejs/plugin-react';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

// `/api/*` handlers run on the serverless host (`vercel dev` locally, port 3000).
export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      '@app': path.resolve(rootDir, 'src/app'),
      '@lib': path.resolve(rootDir, 'src/lib'),
      '@components': path.resolve(rootDir, 'src/components'),
    },
  },
  server: {
    proxy: {
      '/api': process.env.API_PROXY_TARGET || 'http://localhost:3000',
    },
  },
});
