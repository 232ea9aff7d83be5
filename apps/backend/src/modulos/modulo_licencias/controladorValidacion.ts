/**
 * Controlador publico de validacion (cliente de escritorio).
 *
 * Contrato:
 * - Toda decision del motor (valid, disabled, expired, banned, machine_limit, not_found) es 200
 *   con su `status`; solo los errores de entrada o de infraestructura usan codigos HTTP de error.
 */
import type { Request, Response } from 'express';
import type { ServicioValidacion } from './servicioValidacion';
import { respuestaDecision } from './respuestasLicencias';
import type { EntradaDesactivarLicencia, EntradaValidarLicencia } from './validacionesLicencias';

const MENSAJES_DESACTIVACION = {
  licencia_no_encontrada: 'License not found',
  maquina_no_encontrada: 'Machine not found'
} as const;

export function crearControladorValidacion(servicio: ServicioValidacion) {
  async function validarLicencia(req: Request, res: Response) {
    const datos: EntradaValidarLicencia = req.body;
    const decision = await servicio.validar({
      claveLicencia: datos.license_key,
      huellaMaquina: datos.machine_fingerprint,
      idDispositivo: datos.device_id ?? null,
      versionCliente: datos.app_version ?? null,
      ip: req.ip ?? null
    });
    res.json(respuestaDecision(decision));
  }

  async function desactivarLicencia(req: Request, res: Response) {
    const datos: EntradaDesactivarLicencia = req.body;
    const resultado = await servicio.desactivar({
      claveLicencia: datos.license_key,
      huellaMaquina: datos.machine_fingerprint,
      ip: req.ip ?? null
    });
    if (resultado.exito) {
      res.json({ success: true });
      return;
    }
    res.json({ success: false, error: MENSAJES_DESACTIVACION[resultado.motivo] });
  }

  return { validarLicencia, desactivarLicencia };
}
