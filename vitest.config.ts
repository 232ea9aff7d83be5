/**
 * vitest.config
 *
 * Responsabilidad: Ejecutar las suites de todos los workspaces en una sola corrida.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['apps/backend', 'apps/cliente_licencias']
  }
});
