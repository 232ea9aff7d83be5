/**
 * Formato de red (snake_case) de licencias, activaciones, decisiones y registros de actividad.
 */
import type { RegistroActividad } from '../modulo_auditoria/shared/tiposActividad';
import { estaExpirada, mensajeDecision } from './domain/politicaValidacion';
import type { Activacion, DecisionValidacion, Licencia } from './shared/tiposLicencias';

const iso = (fecha: Date | null) => (fecha ? fecha.toISOString() : null);

export function respuestaLicencia(licencia: Licencia, ahora: Date) {
  return {
    license_key: licencia.clave,
    email: licencia.correo,
    name: licencia.nombre,
    license_type: licencia.tipoLicencia,
    max_machines: licencia.maxMaquinas,
    machines_used: licencia.maquinasVinculadas.length,
    features: licencia.funciones,
    active: licencia.activa,
    expired: estaExpirada(licencia, ahora),
    created_at: licencia.creadaEn.toISOString(),
    expires_at: iso(licencia.expiraEn),
    custom_message: licencia.mensajePersonalizado,
    notes: licencia.notas,
    last_check: iso(licencia.ultimoContactoEn),
    last_ip: licencia.ultimaIp,
    last_version: licencia.ultimaVersion
  };
}

export function respuestaActivacion(activacion: Activacion) {
  return {
    license_key: activacion.clave,
    machine_hash: activacion.hashMaquina,
    device_id: activacion.idDispositivo,
    ip: activacion.ip,
    app_version: activacion.versionCliente,
    activated_at: activacion.activadaEn.toISOString()
  };
}

export function respuestaRegistro(registro: RegistroActividad) {
  return {
    action: registro.accion,
    license_key: registro.claveLicencia,
    device_id: registro.idDispositivo,
    ip: registro.ip,
    details: registro.detalles,
    created_at: registro.registradoEn.toISOString()
  };
}

export function respuestaDecision(decision: DecisionValidacion) {
  const message = mensajeDecision(decision);
  switch (decision.estado) {
    case 'valid':
      return {
        status: decision.estado,
        message,
        license_type: decision.licencia.tipoLicencia,
        features: decision.licencia.funciones,
        expires_at: iso(decision.licencia.expiraEn),
        max_machines: decision.licencia.maxMaquinas
      };
    case 'expired':
      return { status: decision.estado, message, expires_at: decision.expiradaEn.toISOString() };
    case 'banned':
      return { status: decision.estado, message, ban_reason: decision.razonBaneo };
    case 'machine_limit':
      return { status: decision.estado, message, max_machines: decision.maxMaquinas };
    case 'disabled':
    case 'not_found':
      return { status: decision.estado, message };
  }
}
