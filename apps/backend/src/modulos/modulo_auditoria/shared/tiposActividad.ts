/**
 * Tipos del registro de actividad (append-only).
 */
export const ACCIONES_ACTIVIDAD = [
  'activate',
  'validate',
  'validate_failed',
  'deactivate',
  'license_created',
  'bulk_generate',
  'license_updated',
  'license_deleted',
  'license_reset',
  'license_toggled',
  'bulk_disable_expired',
  'device_banned',
  'device_unbanned',
  'device_status_changed'
] as const;

export type AccionActividad = (typeof ACCIONES_ACTIVIDAD)[number];

export interface RegistroActividad {
  accion: AccionActividad;
  claveLicencia: string | null;
  idDispositivo: string | null;
  ip: string | null;
  detalles: Record<string, unknown>;
  registradoEn: Date;
}

export type NuevoRegistroActividad = Omit<RegistroActividad, 'registradoEn' | 'claveLicencia' | 'idDispositivo' | 'ip'> &
  Partial<Pick<RegistroActividad, 'claveLicencia' | 'idDispositivo' | 'ip'>>;

export interface RepositorioActividad {
  registrar(registro: RegistroActividad): Promise<void>;
  /** Mas recientes primero. */
  listarRecientes(limite: number): Promise<RegistroActividad[]>;
  contarDesde(desde: Date): Promise<number>;
}
