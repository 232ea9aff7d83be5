/**
 * monitorLicencia
 *
 * Responsabilidad: Maquina de estados del cliente (sin_vincular -> vinculado -> revocado) y sondeo periodico.
 * Limites:
 * - Un solo ciclo en vuelo; si el anterior sigue corriendo, el tick se omite.
 * - Fallos transitorios se registran y se reintentan en el siguiente tick; nunca revocan.
 * - `revocado` es terminal: el monitor no vuelve a iniciar.
 * - Un solo `iniciar` a la vez; `detener` durante un inicio pendiente lo cancela.
 * - Sin conexion al iniciar se acepta la ultima validacion guardada dentro de `horasSinConexion`;
 *   cualquier decision que no sea `valid` borra ese respaldo.
 * - No invoca UI: publica `estado` y `revocado` en su canal de eventos.
 */
import type { ConfiguracionCliente } from '../configuracion';
import { calcularIdDispositivo } from '../dispositivo/huellaDispositivo';
import { claveCorta, log, logError } from '../infraestructura/logging/logger';
import type { DecisionCliente } from '../servicios_api/contratos';
import { ErrorTransitorio } from '../servicios_api/clienteServidorLicencias';
import { CanalEventos } from './canalEventos';
import type {
  AvisoRevocacion,
  DatosLicenciaVinculada,
  EstadoMonitor,
  EventosMonitor,
  RegistroSinConexion,
  RespaldoSinConexion,
  ResultadoInicio,
  TransporteLicencias
} from './tiposMonitor';

const MS_POR_HORA = 60 * 60 * 1000;
const MS_POR_DIA = 24 * MS_POR_HORA;

export class ErrorMonitor extends Error {
  codigo: 'MONITOR_REVOCADO' | 'MONITOR_ACTIVO' | 'MONITOR_SIN_LICENCIA' | 'MONITOR_DETENIDO';

  constructor(codigo: ErrorMonitor['codigo'], mensaje: string) {
    super(mensaje);
    this.name = 'ErrorMonitor';
    this.codigo = codigo;
  }
}

export type OpcionesMonitor = {
  configuracion: ConfiguracionCliente;
  transporte: TransporteLicencias;
  huella: string;
  // Sin id explicito se usa el hash salado de la huella.
  idDispositivo?: string;
  respaldo?: RespaldoSinConexion;
  ahora?: () => Date;
};

type Arranque =
  | { tipo: 'rechazo'; decision: Exclude<DecisionCliente, { estado: 'valid' }> }
  | { tipo: 'vinculada'; licencia: DatosLicenciaVinculada; sinConexion: boolean };

export function avisoPorBaneo(razon: string | null): AvisoRevocacion {
  return {
    tipo: 'dispositivo_baneado',
    titulo: 'Device Banned',
    mensaje: razon ? `This device has been banned: ${razon}` : 'This device has been banned',
    origen: 'banned'
  };
}

export function avisoPorDecision(decision: Exclude<DecisionCliente, { estado: 'valid' }>): AvisoRevocacion {
  if (decision.estado === 'banned') return avisoPorBaneo(decision.razonBaneo);
  return {
    tipo: 'licencia_deshabilitada',
    titulo: 'License Disabled',
    mensaje: decision.mensaje || 'Your license is no longer valid',
    origen: decision.estado
  };
}

function datosVinculados(clave: string, decision: Extract<DecisionCliente, { estado: 'valid' }>): DatosLicenciaVinculada {
  return {
    clave,
    tipoLicencia: decision.tipoLicencia,
    funciones: decision.funciones,
    expiraEn: decision.expiraEn,
    maxMaquinas: decision.maxMaquinas,
    mensaje: decision.mensaje
  };
}

export function crearMonitorLicencia(opciones: OpcionesMonitor) {
  const { configuracion, transporte, huella, respaldo } = opciones;
  const idDispositivo = opciones.idDispositivo ?? calcularIdDispositivo(huella);
  const ahora = opciones.ahora ?? (() => new Date());
  const eventos = new CanalEventos<EventosMonitor>();

  let estado: EstadoMonitor = 'sin_vincular';
  let licencia: DatosLicenciaVinculada | null = null;
  let avisoRevocacion: AvisoRevocacion | null = null;
  let temporizador: NodeJS.Timeout | null = null;
  let enEjecucion = false;
  let inicioEnCurso = false;
  // Cada `detener` invalida los inicios pendientes.
  let generacion = 0;

  function cambiarEstado(actual: EstadoMonitor) {
    const anterior = estado;
    if (anterior === actual) return;
    estado = actual;
    log('info', 'Cambio de estado del monitor de licencia', { anterior, actual });
    eventos.emitir('estado', { anterior, actual });
  }

  function cancelarSondeo() {
    if (!temporizador) return;
    clearInterval(temporizador);
    temporizador = null;
  }

  async function guardarRespaldo(datos: DatosLicenciaVinculada) {
    if (!respaldo) return;
    try {
      await respaldo.guardar({ licencia: datos, validadaEn: ahora() });
    } catch (error) {
      logError('No se pudo guardar el respaldo de la licencia', error);
    }
  }

  async function olvidarRespaldo() {
    if (!respaldo) return;
    try {
      await respaldo.borrar();
    } catch (error) {
      logError('No se pudo borrar el respaldo de la licencia', error);
    }
  }

  async function leerRespaldoVigente(clave: string): Promise<{ licencia: DatosLicenciaVinculada; horas: number } | null> {
    if (!respaldo || configuracion.horasSinConexion <= 0) return null;
    let registro: RegistroSinConexion | null;
    try {
      registro = await respaldo.leer();
    } catch (error) {
      logError('No se pudo leer el respaldo de la licencia', error);
      return null;
    }
    if (!registro || registro.licencia.clave !== clave) return null;

    const momento = ahora().getTime();
    const horas = (momento - registro.validadaEn.getTime()) / MS_POR_HORA;
    if (horas < 0 || horas > configuracion.horasSinConexion) return null;
    const { expiraEn } = registro.licencia;
    if (expiraEn && expiraEn.getTime() < momento) return null;
    return { licencia: registro.licencia, horas };
  }

  function revocar(aviso: AvisoRevocacion) {
    if (estado === 'revocado') return;
    cancelarSondeo();
    void olvidarRespaldo();
    avisoRevocacion = aviso;
    log('warn', 'Licencia revocada', {
      tipo: aviso.tipo,
      origen: aviso.origen,
      clave: licencia ? claveCorta(licencia.clave) : null
    });
    licencia = null;
    cambiarEstado('revocado');
    eventos.emitir('revocado', aviso);
  }

  function validarRemoto(clave: string) {
    return transporte.validar({ clave, huella, idDispositivo, versionApp: configuracion.versionApp });
  }

  async function ejecutarCiclo(): Promise<void> {
    if (!temporizador || enEjecucion) return;
    enEjecucion = true;
    try {
      const remoto = await transporte.consultarEstado(idDispositivo);
      if (!temporizador || !licencia) return;
      if (remoto.estado === 'banned') {
        revocar(avisoPorBaneo(remoto.razon));
        return;
      }

      const decision = await validarRemoto(licencia.clave);
      if (!temporizador || !licencia) return;
      if (decision.estado === 'valid') {
        licencia = datosVinculados(licencia.clave, decision);
        await guardarRespaldo(licencia);
        return;
      }
      revocar(avisoPorDecision(decision));
    } catch (error) {
      if (error instanceof ErrorTransitorio) {
        log('warn', 'Fallo transitorio al verificar la licencia; se reintenta en el siguiente ciclo', {
          motivo: error.message,
          status: error.status ?? null
        });
        return;
      }
      logError('Error al verificar la licencia; se reintenta en el siguiente ciclo', error);
    } finally {
      enEjecucion = false;
    }
  }

  async function validarAlIniciar(clave: string): Promise<Arranque> {
    let decision: DecisionCliente;
    try {
      decision = await validarRemoto(clave);
    } catch (error) {
      if (!(error instanceof ErrorTransitorio)) throw error;
      const respaldoVigente = await leerRespaldoVigente(clave);
      if (!respaldoVigente) throw error;
      log('warn', 'Servidor de licencias inalcanzable; se usa la ultima validacion guardada', {
        clave: claveCorta(clave),
        horasSinConexion: Math.round(respaldoVigente.horas * 10) / 10,
        motivo: error.message
      });
      return { tipo: 'vinculada', licencia: respaldoVigente.licencia, sinConexion: true };
    }

    if (decision.estado !== 'valid') {
      await olvidarRespaldo();
      return { tipo: 'rechazo', decision };
    }
    const datos = datosVinculados(clave, decision);
    await guardarRespaldo(datos);
    return { tipo: 'vinculada', licencia: datos, sinConexion: false };
  }

  async function iniciar(clave: string): Promise<ResultadoInicio> {
    if (estado === 'revocado') {
      throw new ErrorMonitor('MONITOR_REVOCADO', 'La licencia fue revocada; reinicie la aplicacion');
    }
    if (estado === 'vinculado' || inicioEnCurso) {
      throw new ErrorMonitor('MONITOR_ACTIVO', 'El monitor ya tiene una licencia vinculada o un inicio en curso');
    }

    inicioEnCurso = true;
    const generacionInicio = generacion;
    try {
      const claveNormalizada = clave.trim().toUpperCase();
      const arranque = await validarAlIniciar(claveNormalizada);
      if (generacion !== generacionInicio) {
        throw new ErrorMonitor('MONITOR_DETENIDO', 'El monitor se detuvo antes de terminar el inicio');
      }
      if (arranque.tipo === 'rechazo') {
        log('warn', 'Activacion rechazada por el servidor', {
          clave: claveCorta(claveNormalizada),
          estado: arranque.decision.estado
        });
        return { vinculado: false, decision: arranque.decision };
      }

      licencia = arranque.licencia;
      cambiarEstado('vinculado');
      temporizador = setInterval(() => {
        void ejecutarCiclo();
      }, configuracion.intervaloSondeoMs);
      log('ok', 'Sondeo de licencia iniciado', {
        clave: claveCorta(claveNormalizada),
        intervaloMs: configuracion.intervaloSondeoMs,
        sinConexion: arranque.sinConexion
      });
      return { vinculado: true, licencia: arranque.licencia, sinConexion: arranque.sinConexion };
    } finally {
      inicioEnCurso = false;
    }
  }

  function detener() {
    generacion += 1;
    if (estado !== 'vinculado') return;
    cancelarSondeo();
    licencia = null;
    cambiarEstado('sin_vincular');
  }

  async function desactivar() {
    if (!licencia) {
      throw new ErrorMonitor('MONITOR_SIN_LICENCIA', 'No hay licencia vinculada para desactivar');
    }
    const { clave } = licencia;
    detener();
    await olvidarRespaldo();
    const resultado = await transporte.desactivar(clave, huella);
    log(resultado.exito ? 'ok' : 'warn', 'Desactivacion de licencia en este equipo', {
      clave: claveCorta(clave),
      exito: resultado.exito,
      error: resultado.error
    });
    return resultado;
  }

  function diasRestantes(): number | null {
    if (!licencia?.expiraEn) return null;
    return Math.max(0, Math.floor((licencia.expiraEn.getTime() - ahora().getTime()) / MS_POR_DIA));
  }

  function tieneFuncion(nombre: string): boolean {
    if (!licencia) return false;
    const buscada = nombre.toLowerCase();
    return licencia.funciones.some((funcion) => funcion.toLowerCase() === buscada);
  }

  return {
    eventos,
    iniciar,
    detener,
    desactivar,
    diasRestantes,
    tieneFuncion,
    verificarAhora: ejecutarCiclo,
    obtenerEstado: () => estado,
    obtenerLicencia: () => licencia,
    obtenerAvisoRevocacion: () => avisoRevocacion
  };
}

export type MonitorLicencia = ReturnType<typeof crearMonitorLicencia>;
