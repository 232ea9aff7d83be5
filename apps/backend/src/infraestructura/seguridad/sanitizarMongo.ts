/**
 * sanitizarMongo
 *
 * Responsabilidad: Quitar operadores de MongoDB (`$gt`, `$where`...) y claves con `.` o de prototipo
 * de body, query y params antes de que lleguen a los repositorios.
 * Limites: En Express 5 `req.query` es un getter; se muta el objeto en lugar de reasignarlo.
 * No sustituye la validacion con Zod.
 */
import type { NextFunction, Request, Response } from 'express';
import { log } from '../logging/logger';

const CLAVES_PROTOTIPO = new Set(['__proto__', 'prototype', 'constructor']);

function esObjetoPlano(valor: unknown): valor is Record<string, unknown> {
  return typeof valor === 'object' && valor !== null && Object.prototype.toString.call(valor) === '[object Object]';
}

export function esClaveOperador(clave: string): boolean {
  return CLAVES_PROTOTIPO.has(clave) || clave.startsWith('$') || clave.includes('.');
}

/** Elimina en sitio las claves peligrosas y devuelve las rutas eliminadas. */
export function depurarOperadores(valor: unknown, prefijo = ''): string[] {
  const eliminadas: string[] = [];
  if (Array.isArray(valor)) {
    valor.forEach((item, indice) => eliminadas.push(...depurarOperadores(item, `${prefijo}[${indice}]`)));
    return eliminadas;
  }
  if (!esObjetoPlano(valor)) return eliminadas;

  for (const clave of Object.keys(valor)) {
    const ruta = prefijo ? `${prefijo}.${clave}` : clave;
    if (esClaveOperador(clave)) {
      delete valor[clave];
      eliminadas.push(ruta);
      continue;
    }
    eliminadas.push(...depurarOperadores(valor[clave], ruta));
  }
  return eliminadas;
}

export function sanitizarMongo() {
  return (req: Request, _res: Response, next: NextFunction) => {
    const eliminadas = [
      ...depurarOperadores(req.body, 'body'),
      ...depurarOperadores(req.query, 'query'),
      ...depurarOperadores(req.params, 'params')
    ];
    if (eliminadas.length > 0 && process.env.NODE_ENV !== 'test') {
      log('warn', 'Claves con operadores eliminadas de la request', {
        requestId: req.requestId,
        route: req.path,
        claves: eliminadas.slice(0, 20)
      });
    }
    next();
  };
}
