import react from '@vitejs/plugin-react';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [react()],
  test: {
    include: ['src/**/__tests__/**/*.test.ts', 'frontend/src/**/__tests__/**/*.test.{ts,tsx}'],
    environment: 'node',
    restoreMocks: true
  }
});
