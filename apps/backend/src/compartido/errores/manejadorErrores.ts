/**
 * Middleware de manejo de errores para el API.
 *
 * Contrato:
 * - `ErrorAplicacion` se serializa tal cual (codigo/estado/detalles).
 * - Errores de body-parser (JSON malformado, payload grande) se normalizan a 400/413.
 * - Errores no esperados se registran (excepto en tests) y se responden con 500.
 *
 * El formato del envelope es parte del contrato publico del API.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from './errorAplicacion';
import { logError } from '../../infraestructura/logging/logger';

function leerCampo(error: object, campo: string): unknown {
  return campo in error ? Reflect.get(error, campo) : undefined;
}

function obtenerStatusYTipo(error: unknown): { status: unknown; type: unknown } {
  if (typeof error !== 'object' || !error) {
    return { status: undefined, type: undefined };
  }

  return {
    status: leerCampo(error, 'status') ?? leerCampo(error, 'statusCode'),
    type: leerCampo(error, 'type')
  };
}

function esPayloadDemasiadoGrande(error: unknown): boolean {
  const { status, type } = obtenerStatusYTipo(error);
  return status === 413 || type === 'entity.too.large';
}

function esJsonMalformado(error: unknown): boolean {
  const { type } = obtenerStatusYTipo(error);
  return type === 'entity.parse.failed';
}

function responderErrorSimple(res: Response, status: number, codigo: string, mensaje: string) {
  res.status(status).json({
    error: {
      codigo,
      mensaje
    }
  });
}

export function manejadorErrores(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  void _next;

  if (esPayloadDemasiadoGrande(error)) {
    responderErrorSimple(res, 413, 'PAYLOAD_DEMASIADO_GRANDE', 'Payload demasiado grande');
    return;
  }

  if (esJsonMalformado(error)) {
    responderErrorSimple(res, 400, 'JSON_INVALIDO', 'El cuerpo no es JSON valido');
    return;
  }

  if (error instanceof ErrorAplicacion) {
    if (error.estadoHttp >= 500 && process.env.NODE_ENV !== 'test') {
      logError('Error controlado 5xx en request', error, {
        requestId: req.requestId,
        route: req.path,
        method: req.method,
        status: error.estadoHttp,
        codigo: error.codigo
      });
    }

    res.status(error.estadoHttp).json({
      error: {
        codigo: error.codigo,
        mensaje: error.message,
        detalles: error.detalles
      }
    });
    return;
  }

  // Errores no esperados (p. ej. Mongo caido): mensaje generico al cliente.
  const entorno = process.env.NODE_ENV;
  if (entorno !== 'test') {
    logError('Error no controlado en request', error, {
      requestId: req.requestId,
      route: req.path,
      method: req.method
    });
  }

  const exponerMensaje = entorno !== 'production';
  const mensaje = exponerMensaje && error instanceof Error ? error.message : 'Error interno';
  responderErrorSimple(res, 500, 'ERROR_INTERNO', mensaje);
}
