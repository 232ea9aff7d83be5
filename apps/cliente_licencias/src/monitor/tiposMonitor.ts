/**
 * tiposMonitor
 *
 * Responsabilidad: Tipos del monitor de licencia (estados, eventos, avisos y transporte remoto).
 */
import type {
  DecisionCliente,
  EstadoDecisionCliente,
  EstadoRemotoDispositivo,
  ResultadoDesactivacionCliente
} from '../servicios_api/contratos';
import type { SolicitudValidacionCliente } from '../servicios_api/clienteServidorLicencias';

export type EstadoMonitor = 'sin_vincular' | 'vinculado' | 'revocado';

export type AvisoRevocacion = {
  tipo: 'dispositivo_baneado' | 'licencia_deshabilitada';
  titulo: 'Device Banned' | 'License Disabled';
  mensaje: string;
  // Estado remoto que provoco la revocacion (decision de validate o `banned` de status).
  origen: EstadoDecisionCliente;
};

export type CambioEstadoMonitor = {
  anterior: EstadoMonitor;
  actual: EstadoMonitor;
};

export type EventosMonitor = {
  estado: CambioEstadoMonitor;
  revocado: AvisoRevocacion;
};

export type DatosLicenciaVinculada = {
  clave: string;
  tipoLicencia: string;
  funciones: string[];
  expiraEn: Date | null;
  maxMaquinas: number;
  mensaje: string;
};

// `sinConexion`: el servidor no respondio y se uso la ultima validacion guardada.
export type ResultadoInicio =
  | { vinculado: true; licencia: DatosLicenciaVinculada; sinConexion: boolean }
  | { vinculado: false; decision: Exclude<DecisionCliente, { estado: 'valid' }> };

export interface TransporteLicencias {
  validar(solicitud: SolicitudValidacionCliente): Promise<DecisionCliente>;
  consultarEstado(idDispositivo: string): Promise<EstadoRemotoDispositivo>;
  desactivar(clave: string, huella: string): Promise<ResultadoDesactivacionCliente>;
}

export type RegistroSinConexion = {
  licencia: DatosLicenciaVinculada;
  validadaEn: Date;
};

/** Ultima decision `valid` de este equipo, para el periodo de gracia sin conexion. */
export interface RespaldoSinConexion {
  guardar(registro: RegistroSinConexion): Promise<void>;
  leer(): Promise<RegistroSinConexion | null>;
  borrar(): Promise<void>;
}
