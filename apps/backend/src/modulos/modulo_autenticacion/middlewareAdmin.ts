/**
 * Autenticacion del panel de administracion por cabecera `X-Admin-Key`.
 *
 * Contrato:
 * - Sin clave configurada en el servidor, toda llamada admin es rechazada.
 * - La comparacion es en tiempo constante sobre los hashes de ambas claves.
 * - Se monta antes de cualquier ruta admin: un rechazo no tiene efectos secundarios.
 */
import { createHash, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { errorNoAutorizado } from '../../compartido/errores/errorAplicacion';
import { log } from '../../infraestructura/logging/logger';

function digerir(valor: string): Buffer {
  return createHash('sha256').update(valor).digest();
}

export function compararClaveSegura(recibida: string, esperada: string): boolean {
  return timingSafeEqual(digerir(recibida), digerir(esperada));
}

export function requerirAdmin(obtenerClaveAdmin: () => string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const esperada = obtenerClaveAdmin();
    const recibida = String(req.header('x-admin-key') ?? '').trim();
    if (!esperada || !recibida || !compararClaveSegura(recibida, esperada)) {
      if (process.env.NODE_ENV !== 'test') {
        log('warn', 'Acceso admin rechazado', { requestId: req.requestId, route: req.path, ip: req.ip });
      }
      next(errorNoAutorizado());
      return;
    }
    next();
  };
}
