/**
 * contratos
 *
 * Responsabilidad: Esquemas de las respuestas del servidor de licencias y su traduccion a decisiones tipadas.
 * Limites: Campos desconocidos se ignoran; un cambio de forma en el servidor se reporta como respuesta invalida.
 */
import { z } from 'zod';

export const ESTADOS_DISPOSITIVO = ['visitor', 'active', 'suspicious', 'hacking', 'banned'] as const;
export type EstadoDispositivo = (typeof ESTADOS_DISPOSITIVO)[number];

export type DecisionCliente =
  | {
      estado: 'valid';
      mensaje: string;
      tipoLicencia: string;
      funciones: string[];
      expiraEn: Date | null;
      maxMaquinas: number;
    }
  | { estado: 'expired'; mensaje: string; expiraEn: Date | null }
  | { estado: 'banned'; mensaje: string; razonBaneo: string | null }
  | { estado: 'machine_limit'; mensaje: string; maxMaquinas: number | null }
  | { estado: 'disabled' | 'not_found'; mensaje: string };

export type EstadoDecisionCliente = DecisionCliente['estado'];

const mensaje = z.string().default('');
const fecha = z
  .string()
  .datetime()
  .nullable()
  .optional()
  .transform((valor) => (valor ? new Date(valor) : null));

const esquemaDecisionServidor = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('valid'),
    message: mensaje,
    license_type: z.string(),
    features: z.array(z.string()).default([]),
    expires_at: fecha,
    max_machines: z.number().int()
  }),
  z.object({ status: z.literal('expired'), message: mensaje, expires_at: fecha }),
  z.object({ status: z.literal('banned'), message: mensaje, ban_reason: z.string().nullable().optional() }),
  z.object({ status: z.literal('machine_limit'), message: mensaje, max_machines: z.number().int().optional() }),
  z.object({ status: z.enum(['disabled', 'not_found']), message: mensaje })
]);

export const esquemaRespuestaValidacion = esquemaDecisionServidor.transform((respuesta): DecisionCliente => {
  switch (respuesta.status) {
    case 'valid':
      return {
        estado: 'valid',
        mensaje: respuesta.message,
        tipoLicencia: respuesta.license_type,
        funciones: respuesta.features,
        expiraEn: respuesta.expires_at,
        maxMaquinas: respuesta.max_machines
      };
    case 'expired':
      return { estado: 'expired', mensaje: respuesta.message, expiraEn: respuesta.expires_at };
    case 'banned':
      return { estado: 'banned', mensaje: respuesta.message, razonBaneo: respuesta.ban_reason ?? null };
    case 'machine_limit':
      return { estado: 'machine_limit', mensaje: respuesta.message, maxMaquinas: respuesta.max_machines ?? null };
    case 'disabled':
    case 'not_found':
      return { estado: respuesta.status, mensaje: respuesta.message };
  }
});

export const esquemaRespuestaEstado = z
  .object({
    status: z.enum(ESTADOS_DISPOSITIVO),
    reason: z.string().nullable().default(null)
  })
  .transform((respuesta) => ({ estado: respuesta.status, razon: respuesta.reason }));

export type EstadoRemotoDispositivo = z.output<typeof esquemaRespuestaEstado>;

export const esquemaRespuestaDesactivacion = z
  .object({
    success: z.boolean(),
    error: z.string().optional()
  })
  .transform((respuesta) => ({ exito: respuesta.success, error: respuesta.error ?? null }));

export type ResultadoDesactivacionCliente = z.output<typeof esquemaRespuestaDesactivacion>;

// Cuerpo de error del servidor: { error: { codigo, mensaje, detalles } }.
export const esquemaErrorServidor = z.object({
  error: z.object({
    codigo: z.string().optional(),
    mensaje: z.string().optional(),
    detalles: z.unknown().optional()
  })
});
