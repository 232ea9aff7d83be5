/**
 * setup
 *
 * Responsabilidad: Entorno comun de las pruebas del backend (se carga antes que `configuracion`).
 */
process.env.NODE_ENV = 'test';

// En pruebas de integracion se realizan muchas requests en poco tiempo.
// Subimos el limite para evitar falsos negativos por rate limiting.
process.env.RATE_LIMIT_LIMIT = '100000';

process.env.ADMIN_API_KEY = 'test-secret';
process.env.MONGODB_URI = '';
