import react from '@vitejs/plugin-react';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [react()],
  test: {
    include: ['frontend/src/**/*.test.ts', 'frontend/src/**/*.test.tsx'],
    environment: 'jsdom',
    setupFiles: ['vitest.setup.ts'],
  },
});
