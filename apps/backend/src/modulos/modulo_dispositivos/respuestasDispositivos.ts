/**
 * Formato de red (snake_case) de dispositivos.
 */
import type { Dispositivo } from './shared/tiposDispositivos';

export function respuestaDispositivo(dispositivo: Dispositivo) {
  return {
    device_id: dispositivo.idDispositivo,
    license_key: dispositivo.claveLicencia,
    status: dispositivo.estado,
    first_seen: dispositivo.primerContactoEn.toISOString(),
    last_seen: dispositivo.ultimoContactoEn.toISOString(),
    last_ip: dispositivo.ultimaIp,
    visits: dispositivo.visitas,
    failed_attempts: dispositivo.intentosFallidos,
    ban_reason: dispositivo.razonBaneo,
    banned_at: dispositivo.baneadoEn ? dispositivo.baneadoEn.toISOString() : null
  };
}
