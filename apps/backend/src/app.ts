/**
 * Crea la app HTTP (Express) del API de licencias.
 *
 * Principios:
 * - Seguridad por defecto (cabeceras, sanitización, rate-limit)
 * - Validación en modulos (Zod) y error envelope consistente
 * - Sin side-effects al importar: repositorios, reloj y configuracion llegan por parametro
 */
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { crearDependenciasMongo, crearServicios, type DependenciasApp } from './dependencias';
import { crearRouterAdmin, crearRouterApi } from './rutas';
import { manejadorErrores } from './compartido/errores/manejadorErrores';
import { middlewareIdSolicitud, middlewareRegistroSolicitud } from './compartido/observabilidad/middlewareObservabilidad';
import { sanitizarMongo } from './infraestructura/seguridad/sanitizarMongo';

export function crearApp(dependencias: Partial<DependenciasApp> = {}) {
  const deps: DependenciasApp = { ...crearDependenciasMongo(), ...dependencias };
  const { configuracion } = deps;
  const servicios = crearServicios(deps);
  const app = express();

  // Reduce leakage de informacion sobre la tecnologia del servidor.
  app.disable('x-powered-by');

  app.use(helmet());
  app.use(
    cors({
      origin: configuracion.corsOrigenes,
      allowedHeaders: ['Content-Type', 'X-Admin-Key', 'X-Request-Id']
    })
  );
  app.use(express.json({ limit: configuracion.limiteJson }));
  app.use(middlewareIdSolicitud);
  app.use(sanitizarMongo());
  app.use(middlewareRegistroSolicitud);
  app.use(
    rateLimit({
      windowMs: configuracion.rateLimitWindowMs,
      limit: configuracion.rateLimitLimit,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path.startsWith('/api/salud')
    })
  );

  app.use('/api', crearRouterApi(servicios));
  app.use(
    '/admin',
    crearRouterAdmin(servicios, { reloj: deps.reloj, obtenerClaveAdmin: () => configuracion.adminApiKey })
  );

  app.use(manejadorErrores);

  return app;
}
