/**
 * Tipos del modulo de licencias: entidades, decisiones y puertos de persistencia.
 */
import type { TIPOS_LICENCIA } from '../../../compartido/validaciones/esquemas';

export type TipoLicencia = (typeof TIPOS_LICENCIA)[number];

export interface Licencia {
  clave: string;
  correo: string | null;
  nombre: string | null;
  tipoLicencia: TipoLicencia;
  maxMaquinas: number;
  /** Hashes de maquina (nunca la huella en claro). */
  maquinasVinculadas: string[];
  funciones: string[];
  activa: boolean;
  creadaEn: Date;
  expiraEn: Date | null;
  mensajePersonalizado: string | null;
  notas: string | null;
  ultimoContactoEn: Date | null;
  ultimaIp: string | null;
  ultimaVersion: string | null;
}

export type NuevaLicencia = Omit<Licencia, 'maquinasVinculadas' | 'ultimoContactoEn' | 'ultimaIp' | 'ultimaVersion'>;

export type CambiosLicencia = Partial<
  Pick<
    Licencia,
    'correo' | 'nombre' | 'tipoLicencia' | 'maxMaquinas' | 'funciones' | 'activa' | 'notas' | 'mensajePersonalizado' | 'expiraEn'
  >
>;

export interface Activacion {
  clave: string;
  hashMaquina: string;
  idDispositivo: string | null;
  ip: string | null;
  versionCliente: string | null;
  activadaEn: Date;
}

/**
 * Resultado del check-and-bind atomico:
 * - `vinculada`: la maquina ocupo un lugar libre.
 * - `ya_vinculada`: otra solicitud concurrente la vinculo primero.
 * - `sin_cupo`: no quedan lugares.
 * - `licencia_inexistente`: la licencia se elimino entre la lectura y el bind.
 */
export type ResultadoVinculacion = 'vinculada' | 'ya_vinculada' | 'sin_cupo' | 'licencia_inexistente';

export type DecisionValidacion =
  | { estado: 'valid'; licencia: Licencia; nuevaActivacion: boolean }
  | { estado: 'disabled'; mensaje: string | null }
  | { estado: 'expired'; expiradaEn: Date }
  | { estado: 'banned'; razonBaneo: string | null }
  | { estado: 'machine_limit'; maxMaquinas: number }
  | { estado: 'not_found' };

export type EstadoDecision = DecisionValidacion['estado'];

export type SolicitudValidacion = {
  claveLicencia: string;
  huellaMaquina: string;
  idDispositivo?: string | null;
  ip?: string | null;
  versionCliente?: string | null;
};

export type ResultadoDesactivacion = { exito: true } | { exito: false; motivo: 'licencia_no_encontrada' | 'maquina_no_encontrada' };

export interface RepositorioLicencias {
  buscarPorClave(clave: string): Promise<Licencia | null>;
  listar(): Promise<Licencia[]>;
  crear(licencias: NuevaLicencia[]): Promise<Licencia[]>;
  actualizar(clave: string, cambios: CambiosLicencia): Promise<Licencia | null>;
  /** Invierte `activa` en una sola escritura; `null` si no existe. */
  alternarActiva(clave: string): Promise<boolean | null>;
  eliminar(clave: string): Promise<boolean>;
  /** Agrega la maquina solo si no esta y si `|maquinas| < maxMaquinas`, en una sola operacion atomica. */
  vincularMaquina(clave: string, hashMaquina: string): Promise<ResultadoVinculacion>;
  desvincularMaquina(clave: string, hashMaquina: string): Promise<boolean>;
  limpiarMaquinas(clave: string): Promise<boolean>;
  registrarContacto(clave: string, datos: { en: Date; ip: string | null; version: string | null }): Promise<void>;
  desactivarExpiradas(ahora: Date): Promise<number>;
}

export interface RepositorioActivaciones {
  /** Idempotente por (clave, hashMaquina). */
  registrar(activacion: Activacion): Promise<void>;
  listar(): Promise<Activacion[]>;
  eliminar(clave: string, hashMaquina: string): Promise<boolean>;
  eliminarPorClave(clave: string): Promise<number>;
}
