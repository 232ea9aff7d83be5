export { crearMonitorLicencia, ErrorMonitor, avisoPorBaneo, avisoPorDecision } from './monitorLicencia';
export type { MonitorLicencia, OpcionesMonitor } from './monitorLicencia';
export { CODIGO_SALIDA_REVOCACION, conectarReaccionRevocacion, reaccionarRevocacion } from './reaccionRevocacion';
export type { OpcionesReaccion, PresentadorRevocacion } from './reaccionRevocacion';
export { CanalEventos } from './canalEventos';
export type {
  AvisoRevocacion,
  CambioEstadoMonitor,
  DatosLicenciaVinculada,
  EstadoMonitor,
  EventosMonitor,
  RegistroSinConexion,
  RespaldoSinConexion,
  ResultadoInicio,
  TransporteLicencias
} from './tiposMonitor';
export { crearConfiguracionCliente } from '../configuracion';
export type { ConfiguracionCliente } from '../configuracion';
export { crearClienteServidorLicencias, ErrorRemoto, ErrorTransitorio } from '../servicios_api/clienteServidorLicencias';
export type { ClienteServidorLicencias } from '../servicios_api/clienteServidorLicencias';
export type { DecisionCliente, EstadoRemotoDispositivo } from '../servicios_api/contratos';
export { calcularHuellaDispositivo, calcularIdDispositivo } from '../dispositivo/huellaDispositivo';
export { crearRespaldoLicenciaArchivo } from '../infraestructura/archivos/respaldoLicencia';
export type { RespaldoLicenciaArchivo } from '../infraestructura/archivos/respaldoLicencia';
