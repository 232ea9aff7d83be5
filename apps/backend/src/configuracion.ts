/**
 * Configuracion centralizada del API de licencias.
 */
import dotenv from 'dotenv';
import path from 'node:path';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({
  quiet: true,
  path: path.resolve(__dirname, '..', '..', '..', '.env')
});

const puerto = Number(process.env.PUERTO_API ?? process.env.PORT ?? 4000);
const mongoUri = process.env.MONGODB_URI ?? process.env.MONGO_URI ?? '';
const entorno = process.env.NODE_ENV ?? 'development';
const limiteJson = process.env.LIMITE_JSON ?? '1mb';
const corsOrigenesRaw = String(process.env.CORS_ORIGENES ?? '').trim();
const corsOrigenes = (corsOrigenesRaw || 'http://localhost:5173')
  .split(',')
  .map((origen) => origen.trim())
  .filter(Boolean);

export function parsearNumeroSeguro(valor: unknown, porDefecto: number, { min, max }: { min?: number; max?: number } = {}) {
  if (valor === undefined || valor === null || valor === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

// La clave de administrador nunca tiene valor por defecto: sin ella el panel
// rechaza todas las operaciones.
const adminApiKey = String(process.env.ADMIN_API_KEY ?? '').trim();
if (entorno === 'production' && !adminApiKey) {
  throw new Error('ADMIN_API_KEY es requerido en producción');
}
if (entorno === 'production' && !mongoUri) {
  throw new Error('MONGODB_URI es requerido en producción');
}
if (entorno === 'production' && !corsOrigenesRaw) {
  throw new Error('CORS_ORIGENES es requerido en producción');
}

const rateLimitWindowMs = parsearNumeroSeguro(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000, {
  min: 1_000,
  max: 24 * 60 * 60 * 1000
});
const rateLimitLimit = parsearNumeroSeguro(process.env.RATE_LIMIT_LIMIT, 600, { min: 1, max: 100_000 });

// Politica de escalamiento por intentos fallidos. Un umbral en 0 la desactiva.
// Nunca banea: solo marca el dispositivo para revision del administrador.
const umbralIntentosSospechoso = parsearNumeroSeguro(process.env.UMBRAL_INTENTOS_SOSPECHOSO, 3, { min: 0, max: 1000 });
const umbralIntentosHacking = parsearNumeroSeguro(process.env.UMBRAL_INTENTOS_HACKING, 10, { min: 0, max: 10_000 });

const maxLicenciasLote = parsearNumeroSeguro(process.env.MAX_LICENCIAS_LOTE, 100, { min: 1, max: 1000 });

export const configuracion = {
  puerto,
  mongoUri,
  entorno,
  limiteJson,
  corsOrigenes,
  adminApiKey,
  rateLimitWindowMs,
  rateLimitLimit,
  politicaEscalamiento: {
    umbralSospechoso: umbralIntentosSospechoso,
    umbralHacking: umbralIntentosHacking
  },
  maxLicenciasLote
};

export type ConfiguracionApi = typeof configuracion;
