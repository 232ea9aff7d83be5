/**
 * Rutas publicas de licencias (cliente de escritorio).
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import type { crearControladorValidacion } from './controladorValidacion';
import { esquemaDesactivarLicencia, esquemaValidarLicencia } from './validacionesLicencias';

export function crearRutasLicencias(controlador: ReturnType<typeof crearControladorValidacion>) {
  const router = Router();

  router.post('/validate', validarCuerpo(esquemaValidarLicencia), controlador.validarLicencia);
  router.post('/deactivate', validarCuerpo(esquemaDesactivarLicencia), controlador.desactivarLicencia);

  return router;
}
