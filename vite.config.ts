import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';
import tailwindcss from 'tailwindcss';
import tailwindConfig from './tailwind.config';

export default defineConfig(({ mode }) => {
    const env = loadEnv(mode, '.', 'VITE_');
    return {
      server: {
        port: Number(env.VITE_DEV_PORT || 5173),
        host: '0.0.0.0',
      },
      plugins: [react()],
      css: {
        postcss: {
          plugins: [tailwindcss(tailwindConfig)],
        },
      },
      build: {
        outDir: 'dist',
      },
    };
});
