import { defineConfig } from 'vite';
import { fileURLToPath } from 'url';

const here = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  // Page sources live in src/, static assets in public/
  root: here('./src'),
  publicDir: here('./public'),
  base: '/',

  // Development server
  server: {
    port: 4200,
    host: true,
    proxy: {
      '/api': {
        target: process.env.API_PROXY_TARGET || 'http://localhost:5000',
        changeOrigin: true,
        secure: false
      }
    }
  },

  preview: {
    port: 4300
  },

  build: {
    target: 'es2020',
    sourcemap: true,
    outDir: here('./dist'),
    emptyOutDir: true,
    assetsDir: 'assets',
    rollupOptions: {
      input: {
        main: here('./src/index.html'),
        calculator: here('./src/calculator.html')
      },
      output: {
        chunkFileNames: 'assets/js/[name]-[hash].js',
        entryFileNames: 'assets/js/[name]-[hash].js',
        assetFileNames: (assetInfo) => {
          const ext = assetInfo.name?.split('.').pop() ?? '';
          if (/png|jpe?g|svg|gif|ico/i.test(ext)) return 'assets/images/[name]-[hash][extname]';
          if (/css/i.test(ext)) return 'assets/css/[name]-[hash][extname]';
          return 'assets/[name]-[hash][extname]';
        }
      }
    }
  }
});
