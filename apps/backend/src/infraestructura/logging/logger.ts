/**
 * logger
 *
 * Responsabilidad: Logging estructurado (una linea JSON por evento) del API de licencias.
 * Limites: No registrar claves de licencia completas ni la clave de administrador.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;

const servicio = 'api-licencias';
const env = process.env.NODE_ENV ?? 'development';

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
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
  const entry = {
    timestamp: new Date().toISOString(),
    service: servicio,
    env,
    level: levelStd,
    message: msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (levelStd === 'error') console.error(line);
  else if (levelStd === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}

/** Recorta una clave de licencia para logs: `ABCD…WXYZ`. */
export function claveCorta(clave: string): string {
  const limpia = String(clave || '');
  if (limpia.length <= 8) return limpia;
  return `${limpia.slice(0, 4)}…${limpia.slice(-4)}`;
}
