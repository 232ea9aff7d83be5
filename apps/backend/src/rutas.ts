/**
 * Registro central de rutas del API de licencias.
 *
 * Convenciones:
 * - `/api/*` es publico: lo usa el cliente de escritorio y los health checks.
 * - `/admin/*` monta `requerirAdmin` antes de cualquier ruta.
 *
 * Nota: El orden de `router.use(...)` es parte del contrato de seguridad.
 */
import { Router } from 'express';
import rutasSalud, { responderMetricas } from './compartido/salud/rutasSalud';
import type { Reloj } from './compartido/tipos/reloj';
import type { ServiciosApp } from './dependencias';
import { requerirAdmin } from './modulos/modulo_autenticacion/middlewareAdmin';
import { crearControladorDispositivos } from './modulos/modulo_dispositivos/controladorDispositivos';
import {
  crearRutasAdminDispositivos,
  crearRutasEstadoDispositivos
} from './modulos/modulo_dispositivos/rutasDispositivos';
import { crearControladorAdminLicencias } from './modulos/modulo_licencias/controladorAdminLicencias';
import { crearControladorValidacion } from './modulos/modulo_licencias/controladorValidacion';
import { crearRutasAdminLicencias } from './modulos/modulo_licencias/rutasAdminLicencias';
import { crearRutasLicencias } from './modulos/modulo_licencias/rutasLicencias';

export function crearRouterApi(servicios: ServiciosApp) {
  const router = Router();

  router.use('/salud', rutasSalud);
  router.get('/metrics', (_req, res) => {
    responderMetricas(res);
  });

  router.use(crearRutasLicencias(crearControladorValidacion(servicios.validacion)));
  router.use(crearRutasEstadoDispositivos(crearControladorDispositivos(servicios.estadoDispositivos)));

  return router;
}

export function crearRouterAdmin(servicios: ServiciosApp, opciones: { reloj: Reloj; obtenerClaveAdmin: () => string }) {
  const router = Router();

  // A partir de aqui: todo requiere X-Admin-Key.
  router.use(requerirAdmin(opciones.obtenerClaveAdmin));
  router.use(crearRutasAdminLicencias(crearControladorAdminLicencias(servicios.adminLicencias, opciones.reloj)));
  router.use(crearRutasAdminDispositivos(crearControladorDispositivos(servicios.estadoDispositivos)));

  return router;
}
