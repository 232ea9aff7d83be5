/**
 * vitest.config
 *
 * Responsabilidad: Configuracion Vitest del cliente de licencias.
 */
import { defineConfig } from 'vitest/config';
import { baseVitestConfig } from '../../vitest.base';

export default defineConfig({
  test: {
    ...baseVitestConfig,
    name: 'cliente-licencias',
    environment: 'node',
    include: ['tests/**/*.test.ts']
  }
});
