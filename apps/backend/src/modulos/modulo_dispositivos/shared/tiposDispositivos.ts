/**
 * Tipos del modulo de estado de dispositivos.
 */
import type { ESTADOS_DISPOSITIVO } from '../../../compartido/validaciones/esquemas';

export type EstadoDispositivo = (typeof ESTADOS_DISPOSITIVO)[number];

export interface Dispositivo {
  idDispositivo: string;
  claveLicencia: string | null;
  estado: EstadoDispositivo;
  primerContactoEn: Date;
  ultimoContactoEn: Date;
  ultimaIp: string | null;
  visitas: number;
  intentosFallidos: number;
  razonBaneo: string | null;
  baneadoEn: Date | null;
}

export type ConsultaEstado = { estado: EstadoDispositivo; razon: string | null };

export type VisitaDispositivo = {
  en: Date;
  ip: string | null;
  claveLicencia: string | null;
};

export type ResultadoCambioEstado = {
  estadoAnterior: EstadoDispositivo | null;
  dispositivo: Dispositivo;
};

export interface RepositorioDispositivos {
  buscar(idDispositivo: string): Promise<Dispositivo | null>;
  /** Upsert: crea el registro como `visitor` si no existe e incrementa `visitas`. */
  registrarVisita(idDispositivo: string, visita: VisitaDispositivo): Promise<Dispositivo>;
  /** Incrementa `intentosFallidos` y devuelve el nuevo valor. */
  registrarIntentoFallido(idDispositivo: string): Promise<number>;
  /** Cambia el estado solo si el actual esta en `permitidos`; `true` si hubo cambio. */
  actualizarEstadoSi(idDispositivo: string, permitidos: readonly EstadoDispositivo[], nuevo: EstadoDispositivo): Promise<boolean>;
  /** Escritura administrativa incondicional (crea el registro si no existe). */
  fijarEstado(
    idDispositivo: string,
    cambio: { estado: EstadoDispositivo; razon: string | null; en: Date; reiniciarIntentos: boolean }
  ): Promise<ResultadoCambioEstado>;
  listar(estado?: EstadoDispositivo): Promise<Dispositivo[]>;
  contarPorEstado(): Promise<Record<string, number>>;
}
