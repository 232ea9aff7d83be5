/**
 * Helpers de validacion con Zod para requests.
 *
 * Idea:
 * - Validar y normalizar entradas lo mas cerca posible del borde HTTP.
 * - Si el schema transforma (p. ej. claves a mayusculas), aqui queda aplicado
 *   y el resto del codigo puede asumir datos normalizados.
 * - La rigidez (`.strict()`) la decide cada schema: el panel admin rechaza
 *   campos desconocidos; los endpoints del cliente de escritorio los toleran.
 */
import type { NextFunction, Request, Response } from 'express';
import type { ZodTypeAny, output } from 'zod';
import { ErrorAplicacion } from '../errores/errorAplicacion';

export function validarCuerpo(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const resultado = schema.safeParse(req.body ?? {});
    if (!resultado.success) {
      next(new ErrorAplicacion('VALIDACION', 'Payload invalido', 400, resultado.error.flatten()));
      return;
    }
    // Importante: mutamos `req.body` con el output del schema (ya validado).
    req.body = resultado.data;
    next();
  };
}

function parsear<T extends ZodTypeAny>(schema: T, valor: unknown, mensaje: string): output<T> {
  const resultado = schema.safeParse(valor ?? {});
  if (!resultado.success) {
    throw new ErrorAplicacion('VALIDACION', mensaje, 400, resultado.error.flatten());
  }
  return resultado.data;
}

// Express 5 expone `req.query` como getter; en lugar de reasignarlo se parsea
// donde se necesita.
export function parsearConsulta<T extends ZodTypeAny>(schema: T, consulta: unknown): output<T> {
  return parsear(schema, consulta, 'Parametros de consulta invalidos');
}

export function parsearParametros<T extends ZodTypeAny>(schema: T, parametros: unknown): output<T> {
  return parsear(schema, parametros, 'Parametros de ruta invalidos');
}
