/**
 * Rutas de estado de dispositivos: sondeo publico y administracion.
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import type { crearControladorDispositivos } from './controladorDispositivos';
import { esquemaBanear, esquemaCambiarEstado, esquemaConsultarEstado } from './validacionesDispositivos';

type ControladorDispositivos = ReturnType<typeof crearControladorDispositivos>;

export function crearRutasEstadoDispositivos(controlador: ControladorDispositivos) {
  const router = Router();
  router.post('/status', validarCuerpo(esquemaConsultarEstado), controlador.consultarEstado);
  return router;
}

export function crearRutasAdminDispositivos(controlador: ControladorDispositivos) {
  const router = Router();

  router.get('/devices', controlador.listarDispositivos);
  router.post('/devices/:id/ban', validarCuerpo(esquemaBanear), controlador.banearDispositivo);
  router.post('/devices/:id/unban', controlador.desbanearDispositivo);
  router.put('/devices/:id/status', validarCuerpo(esquemaCambiarEstado), controlador.cambiarEstadoDispositivo);

  return router;
}
