/**
 * vitest.base
 *
 * Responsabilidad: Opciones Vitest compartidas por los workspaces.
 * Limites: Cambios aqui afectan a todas las suites.
 */
export const baseVitestConfig = {
  clearMocks: true,
  restoreMocks: true,
  mockReset: true,
  testTimeout: 20000,
  hookTimeout: 20000
};
