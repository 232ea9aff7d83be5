/**
 * politicaValidacion
 *
 * Responsabilidad: Reglas puras del motor de validacion (orden de chequeo, expiracion, hash de
 * maquina, formato de claves y mensajes de cada decision).
 * Limites: Sin I/O; el check-and-bind atomico vive en el repositorio.
 */
import { createHash, randomBytes } from 'node:crypto';
import type { DecisionValidacion, Licencia } from '../shared/tiposLicencias';

const MS_POR_DIA = 24 * 60 * 60 * 1000;

/** Hash persistido en lugar de la huella del equipo: sha256 salado, 32 caracteres hex. */
export function calcularHashMaquina(huella: string): string {
  return createHash('sha256').update(`${huella}:salt:v1`).digest('hex').slice(0, 32);
}

/** `XXXXXXXX-XXXXXXXX-XXXXXXXX-XXXXXXXX` en hex mayuscula, 16 bytes aleatorios. */
export function generarClaveLicencia(): string {
  const hex = randomBytes(16).toString('hex').toUpperCase();
  return [hex.slice(0, 8), hex.slice(8, 16), hex.slice(16, 24), hex.slice(24, 32)].join('-');
}

export function normalizarClave(clave: string): string {
  return String(clave ?? '').trim().toUpperCase();
}

export function estaExpirada(licencia: Pick<Licencia, 'expiraEn'>, ahora: Date): boolean {
  return licencia.expiraEn !== null && licencia.expiraEn.getTime() < ahora.getTime();
}

export function calcularExpiracion(ahora: Date, duracionDias: number | null | undefined): Date | null {
  if (duracionDias === null || duracionDias === undefined) return null;
  return new Date(ahora.getTime() + duracionDias * MS_POR_DIA);
}

export type EvaluacionLicencia =
  | { tipo: 'decision'; decision: DecisionValidacion }
  | { tipo: 'ya_vinculada'; licencia: Licencia }
  | { tipo: 'vincular'; licencia: Licencia };

/**
 * Pasos 1-5 de la politica y el pre-chequeo de cupo. Un resultado `vincular` aun debe pasar por el
 * bind atomico, que es quien decide entre `valid` y `machine_limit` bajo concurrencia.
 */
export function evaluarLicencia(params: {
  licencia: Licencia | null;
  hashMaquina: string;
  dispositivoBaneado: { razon: string | null } | null;
  ahora: Date;
}): EvaluacionLicencia {
  const { licencia, hashMaquina, dispositivoBaneado, ahora } = params;
  if (!licencia) return { tipo: 'decision', decision: { estado: 'not_found' } };
  if (!licencia.activa) {
    return { tipo: 'decision', decision: { estado: 'disabled', mensaje: licencia.mensajePersonalizado } };
  }
  if (licencia.expiraEn && estaExpirada(licencia, ahora)) {
    return { tipo: 'decision', decision: { estado: 'expired', expiradaEn: licencia.expiraEn } };
  }
  if (dispositivoBaneado) {
    return { tipo: 'decision', decision: { estado: 'banned', razonBaneo: dispositivoBaneado.razon } };
  }
  if (licencia.maquinasVinculadas.includes(hashMaquina)) return { tipo: 'ya_vinculada', licencia };
  if (licencia.maquinasVinculadas.length >= licencia.maxMaquinas) {
    return { tipo: 'decision', decision: { estado: 'machine_limit', maxMaquinas: licencia.maxMaquinas } };
  }
  return { tipo: 'vincular', licencia };
}

export function mensajeDecision(decision: DecisionValidacion): string {
  switch (decision.estado) {
    case 'valid':
      return decision.nuevaActivacion ? 'License activated' : 'License valid';
    case 'disabled':
      return decision.mensaje || 'License has been disabled';
    case 'expired':
      return 'License has expired';
    case 'banned':
      return 'This device has been banned';
    case 'machine_limit':
      return `Maximum ${decision.maxMaquinas} device(s) allowed`;
    case 'not_found':
      return 'Invalid license key';
  }
}
