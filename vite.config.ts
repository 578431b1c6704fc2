import { defineConfig } from 'vitest/config'
import react from '@vitejs/plugin-react'
import tailwindcss from '@tailwindcss/vite'
import type { PluginOption } from 'vite'

// https://vite.dev/config/
export default defineConfig(() => {
  const isVitest = process.env.VITEST === 'true';
  const plugins: PluginOption[] = [react()];

  if (!isVitest) {
    plugins.push(tailwindcss());
  }

  return {
    plugins,
    // Expose only Vite-prefixed env vars to the client.
    envPrefix: ['VITE_'],
    server: {
      port: 43130,
      strictPort: true,
    },
    test: {
      globals: true,
      environment: 'jsdom',
      setupFiles: ['./tests/setup.ts'],
      include: ['tests/**/*.test.{ts,tsx}'],
      clearMocks: true,
    },
  };
});
