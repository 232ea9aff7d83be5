/**
 * servicioEstadoDispositivos
 *
 * Responsabilidad: Estado por dispositivo (visitor/active/suspicious/hacking/banned), independiente
 * de la validez de la licencia.
 * Limites:
 * - Solo el administrador pone o quita `banned`.
 * - La politica de escalamiento marca `suspicious`/`hacking`, nunca banea ni degrada `hacking`.
 * - `consultarEstado` no escribe: lo usa el sondeo del cliente cada pocos segundos.
 */
import type { Reloj } from '../../compartido/tipos/reloj';
import { registrarConsultaEstado, registrarMutacionAdmin } from '../../compartido/observabilidad/metrics';
import type { ServicioAuditoria } from '../modulo_auditoria/servicioAuditoria';
import type { AccionActividad } from '../modulo_auditoria/shared/tiposActividad';
import type {
  ConsultaEstado,
  Dispositivo,
  EstadoDispositivo,
  RepositorioDispositivos,
  VisitaDispositivo
} from './shared/tiposDispositivos';

export type PoliticaEscalamiento = {
  /** Intentos fallidos para marcar `suspicious`; 0 desactiva. */
  umbralSospechoso: number;
  /** Intentos fallidos para marcar `hacking`; 0 desactiva. */
  umbralHacking: number;
};

export type ResultadoFallo = { intentosFallidos: number; escalado: EstadoDispositivo | null };

export type ServicioEstadoDispositivos = ReturnType<typeof crearServicioEstadoDispositivos>;

function accionPorTransicion(anterior: EstadoDispositivo | null, nuevo: EstadoDispositivo): AccionActividad {
  if (nuevo === 'banned') return 'device_banned';
  if (anterior === 'banned') return 'device_unbanned';
  return 'device_status_changed';
}

export function crearServicioEstadoDispositivos(deps: {
  dispositivos: RepositorioDispositivos;
  auditoria: ServicioAuditoria;
  reloj: Reloj;
  politica: PoliticaEscalamiento;
}) {
  const { dispositivos, auditoria, reloj, politica } = deps;

  async function consultarEstado(idDispositivo: string): Promise<ConsultaEstado> {
    const dispositivo = await dispositivos.buscar(idDispositivo);
    const consulta: ConsultaEstado = dispositivo
      ? { estado: dispositivo.estado, razon: dispositivo.estado === 'banned' ? dispositivo.razonBaneo : null }
      : { estado: 'visitor', razon: null };
    registrarConsultaEstado(consulta.estado);
    return consulta;
  }

  function registrarVisita(idDispositivo: string, visita: VisitaDispositivo): Promise<Dispositivo> {
    return dispositivos.registrarVisita(idDispositivo, visita);
  }

  /** Tras una validacion exitosa; un dispositivo marcado o baneado conserva su estado. */
  function marcarActivo(idDispositivo: string): Promise<boolean> {
    return dispositivos.actualizarEstadoSi(idDispositivo, ['visitor', 'active'], 'active');
  }

  async function registrarFallo(idDispositivo: string): Promise<ResultadoFallo> {
    const intentosFallidos = await dispositivos.registrarIntentoFallido(idDispositivo);
    const { umbralSospechoso, umbralHacking } = politica;

    if (umbralHacking > 0 && intentosFallidos >= umbralHacking) {
      const cambio = await dispositivos.actualizarEstadoSi(idDispositivo, ['visitor', 'active', 'suspicious'], 'hacking');
      return { intentosFallidos, escalado: cambio ? 'hacking' : null };
    }
    if (umbralSospechoso > 0 && intentosFallidos >= umbralSospechoso) {
      const cambio = await dispositivos.actualizarEstadoSi(idDispositivo, ['visitor', 'active'], 'suspicious');
      return { intentosFallidos, escalado: cambio ? 'suspicious' : null };
    }
    return { intentosFallidos, escalado: null };
  }

  async function cambiarEstado(
    idDispositivo: string,
    estado: EstadoDispositivo,
    razon: string | null = null
  ): Promise<Dispositivo> {
    const { estadoAnterior, dispositivo } = await dispositivos.fijarEstado(idDispositivo, {
      estado,
      razon,
      en: reloj.now(),
      reiniciarIntentos: estado === 'visitor' || estado === 'active'
    });
    const accion = accionPorTransicion(estadoAnterior, estado);
    await auditoria.registrar({
      accion,
      idDispositivo,
      claveLicencia: dispositivo.claveLicencia,
      detalles: { estadoAnterior, estado, razon }
    });
    registrarMutacionAdmin(accion);
    return dispositivo;
  }

  function banear(idDispositivo: string, razon: string | null = null): Promise<Dispositivo> {
    return cambiarEstado(idDispositivo, 'banned', razon);
  }

  /** Regresa a `active` si el dispositivo tiene licencia asociada; si no, a `visitor`. */
  async function desbanear(idDispositivo: string): Promise<Dispositivo> {
    const actual = await dispositivos.buscar(idDispositivo);
    return cambiarEstado(idDispositivo, actual?.claveLicencia ? 'active' : 'visitor');
  }

  function listar(estado?: EstadoDispositivo): Promise<Dispositivo[]> {
    return dispositivos.listar(estado);
  }

  function contarPorEstado(): Promise<Record<string, number>> {
    return dispositivos.contarPorEstado();
  }

  return { consultarEstado, registrarVisita, marcarActivo, registrarFallo, cambiarEstado, banear, desbanear, listar, contarPorEstado };
}
