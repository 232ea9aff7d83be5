/**
 * servicioValidacion
 *
 * Responsabilidad: Motor de validacion y desactivacion de licencias por equipo.
 * Limites:
 * - Cada llamada escribe exactamente un registro de actividad.
 * - El bind de maquina es una sola actualizacion condicional; si registrar la activacion falla,
 *   se compensa quitando el hash para no dejar lugares ocupados sin fila.
 * - Tras registrar la fila se relee la licencia: si fue eliminada o reiniciada en el intervalo,
 *   la fila recien escrita se borra y nunca queda una activacion sin hash vinculado.
 */
import type { Reloj } from '../../compartido/tipos/reloj';
import { registrarDecisionValidacion } from '../../compartido/observabilidad/metrics';
import { claveCorta, log, logError } from '../../infraestructura/logging/logger';
import type { ServicioAuditoria } from '../modulo_auditoria/servicioAuditoria';
import type { ServicioEstadoDispositivos } from '../modulo_dispositivos/servicioEstadoDispositivos';
import { calcularHashMaquina, evaluarLicencia, normalizarClave } from './domain/politicaValidacion';
import type {
  DecisionValidacion,
  Licencia,
  RepositorioActivaciones,
  RepositorioLicencias,
  ResultadoDesactivacion,
  SolicitudValidacion
} from './shared/tiposLicencias';

export type ServicioValidacion = ReturnType<typeof crearServicioValidacion>;

export function crearServicioValidacion(deps: {
  licencias: RepositorioLicencias;
  activaciones: RepositorioActivaciones;
  estadoDispositivos: ServicioEstadoDispositivos;
  auditoria: ServicioAuditoria;
  reloj: Reloj;
}) {
  const { licencias, activaciones, estadoDispositivos, auditoria, reloj } = deps;

  async function vincular(
    licencia: Licencia,
    hashMaquina: string,
    solicitud: SolicitudValidacion & { idDispositivo: string },
    ahora: Date,
    reintentar = true
  ): Promise<DecisionValidacion> {
    const resultado = await licencias.vincularMaquina(licencia.clave, hashMaquina);
    switch (resultado) {
      case 'ya_vinculada':
        return { estado: 'valid', licencia, nuevaActivacion: false };
      case 'sin_cupo':
        return { estado: 'machine_limit', maxMaquinas: licencia.maxMaquinas };
      case 'licencia_inexistente':
        return { estado: 'not_found' };
      case 'vinculada':
        break;
    }

    try {
      await activaciones.registrar({
        clave: licencia.clave,
        hashMaquina,
        idDispositivo: solicitud.idDispositivo,
        ip: solicitud.ip ?? null,
        versionCliente: solicitud.versionCliente ?? null,
        activadaEn: ahora
      });
    } catch (error) {
      try {
        await licencias.desvincularMaquina(licencia.clave, hashMaquina);
      } catch (errorCompensacion) {
        logError('No se pudo compensar el bind de maquina', errorCompensacion, { licencia: claveCorta(licencia.clave) });
      }
      throw error;
    }

    const vigente = await licencias.buscarPorClave(licencia.clave);
    if (!vigente || !vigente.maquinasVinculadas.includes(hashMaquina)) {
      await activaciones.eliminar(licencia.clave, hashMaquina);
      log('warn', 'Bind de maquina perdido por un cambio concurrente de la licencia', {
        licencia: claveCorta(licencia.clave),
        eliminada: !vigente
      });
      if (!vigente) return { estado: 'not_found' };
      // Reiniciada: los lugares quedaron libres y se intenta vincular una vez mas.
      if (reintentar) return vincular(vigente, hashMaquina, solicitud, ahora, false);
      return { estado: 'machine_limit', maxMaquinas: vigente.maxMaquinas };
    }
    return {
      estado: 'valid',
      licencia: { ...licencia, maquinasVinculadas: [...licencia.maquinasVinculadas, hashMaquina] },
      nuevaActivacion: true
    };
  }

  async function validar(entrada: SolicitudValidacion): Promise<DecisionValidacion> {
    const clave = normalizarClave(entrada.claveLicencia);
    const hashMaquina = calcularHashMaquina(entrada.huellaMaquina);
    // La huella cruda nunca se persiste; sin device_id se usa su hash.
    const idDispositivo = entrada.idDispositivo?.trim() || hashMaquina;
    const solicitud = { ...entrada, claveLicencia: clave, idDispositivo };
    const ahora = reloj.now();
    const ip = entrada.ip ?? null;

    const licencia = await licencias.buscarPorClave(clave);
    if (licencia) {
      await licencias.registrarContacto(clave, { en: ahora, ip, version: entrada.versionCliente ?? null });
    }
    const dispositivo = await estadoDispositivos.registrarVisita(idDispositivo, {
      en: ahora,
      ip,
      claveLicencia: licencia ? clave : null
    });

    const evaluacion = evaluarLicencia({
      licencia,
      hashMaquina,
      dispositivoBaneado: dispositivo.estado === 'banned' ? { razon: dispositivo.razonBaneo } : null,
      ahora
    });

    let decision: DecisionValidacion;
    if (evaluacion.tipo === 'decision') decision = evaluacion.decision;
    else if (evaluacion.tipo === 'ya_vinculada') decision = { estado: 'valid', licencia: evaluacion.licencia, nuevaActivacion: false };
    else decision = await vincular(evaluacion.licencia, hashMaquina, solicitud, ahora);

    if (decision.estado === 'valid') {
      await estadoDispositivos.marcarActivo(idDispositivo);
      await auditoria.registrar({
        accion: decision.nuevaActivacion ? 'activate' : 'validate',
        claveLicencia: clave,
        idDispositivo,
        ip,
        detalles: { hashMaquina, versionCliente: entrada.versionCliente ?? null }
      });
    } else {
      const fallo = await estadoDispositivos.registrarFallo(idDispositivo);
      await auditoria.registrar({
        accion: 'validate_failed',
        claveLicencia: clave,
        idDispositivo,
        ip,
        detalles: { razon: decision.estado, intentosFallidos: fallo.intentosFallidos, escalado: fallo.escalado }
      });
    }

    registrarDecisionValidacion(decision.estado);
    return decision;
  }

  async function desactivar(entrada: {
    claveLicencia: string;
    huellaMaquina: string;
    ip?: string | null;
  }): Promise<ResultadoDesactivacion> {
    const clave = normalizarClave(entrada.claveLicencia);
    const licencia = await licencias.buscarPorClave(clave);
    if (!licencia) return { exito: false, motivo: 'licencia_no_encontrada' };

    const hashMaquina = calcularHashMaquina(entrada.huellaMaquina);
    const desvinculada = await licencias.desvincularMaquina(clave, hashMaquina);
    const filaEliminada = await activaciones.eliminar(clave, hashMaquina);
    if (!desvinculada && !filaEliminada) return { exito: false, motivo: 'maquina_no_encontrada' };

    await auditoria.registrar({
      accion: 'deactivate',
      claveLicencia: clave,
      ip: entrada.ip ?? null,
      detalles: { hashMaquina }
    });
    return { exito: true };
  }

  return { validar, desactivar };
}
