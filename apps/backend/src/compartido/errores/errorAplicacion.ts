/**
 * Error estandar para respuestas controladas del API.
 *
 * Se serializa como envelope `{ error: { codigo, mensaje, detalles? } }`.
 * `codigo` es estable (orientado a maquina); `detalles` se usa sobre todo
 * para errores de validacion (`zod.flatten()`).
 *
 * Las decisiones de validacion de licencia (disabled, expired, banned, ...)
 * NO son errores: viajan como respuesta 200 con su `status`.
 */
export class ErrorAplicacion extends Error {
  codigo: string;
  estadoHttp: number;
  detalles?: unknown;

  constructor(codigo: string, mensaje: string, estadoHttp = 400, detalles?: unknown) {
    super(mensaje);
    this.name = 'ErrorAplicacion';
    this.codigo = codigo;
    this.estadoHttp = estadoHttp;
    this.detalles = detalles;
  }
}

export function errorNoAutorizado() {
  return new ErrorAplicacion('NO_AUTORIZADO', 'Clave de administrador invalida o ausente', 401);
}

export function errorLicenciaNoEncontrada(clave: string) {
  return new ErrorAplicacion('LICENCIA_NO_ENCONTRADA', 'Licencia no encontrada', 404, { licenseKey: clave });
}
