/**
 * Rutas del panel de administracion de licencias.
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import type { crearControladorAdminLicencias } from './controladorAdminLicencias';
import { esquemaActualizarLicencia, esquemaCrearLicencia, esquemaGenerarLote } from './validacionesLicencias';

export function crearRutasAdminLicencias(controlador: ReturnType<typeof crearControladorAdminLicencias>) {
  const router = Router();

  router.get('/licenses', controlador.listarLicencias);
  router.post('/licenses', validarCuerpo(esquemaCrearLicencia), controlador.crearLicencia);
  router.put('/licenses/:key', validarCuerpo(esquemaActualizarLicencia), controlador.actualizarLicencia);
  router.delete('/licenses/:key', controlador.eliminarLicencia);
  router.post('/licenses/:key/toggle', controlador.alternarLicencia);
  router.post('/licenses/:key/reset', controlador.reiniciarLicencia);

  router.get('/activations', controlador.listarActivaciones);
  router.get('/stats', controlador.obtenerEstadisticas);
  router.get('/logs', controlador.listarLogs);

  router.post('/bulk/generate', validarCuerpo(esquemaGenerarLote), controlador.generarLote);
  router.post('/bulk/disable-expired', controlador.desactivarExpiradas);

  return router;
}
