/**
 * logger
 *
 * Responsabilidad: Logging estructurado (una linea JSON por evento) del cliente de licencias.
 * Limites: La clave de licencia se registra recortada.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;

const servicio = 'cliente-licencias';
const env = process.env.NODE_ENV ?? 'development';

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { value: String(error) };
}

function nivelEstandar(level: NivelLog): 'info' | 'warn' | 'error' {
  if (level === 'warn') return 'warn';
  if (level === 'error') return 'error';
  return 'info';
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  const levelStd = nivelEstandar(level);
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    service: servicio,
    env,
    level: levelStd,
    message: msg,
    ...meta
  });
  if (levelStd === 'error') console.error(line);
  else if (levelStd === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}

export function claveCorta(clave: string): string {
  if (clave.length <= 8) return clave;
  return `${clave.slice(0, 4)}…${clave.slice(-4)}`;
}
