/**
 * Validaciones de los endpoints de licencias (cliente de escritorio y panel admin).
 *
 * Los esquemas del cliente toleran campos extra (versiones viejas mandan mas datos);
 * los del panel admin son `.strict()`.
 */
import { z } from 'zod';
import {
  esquemaClaveLicencia,
  esquemaFunciones,
  esquemaIdDispositivo,
  esquemaTipoLicencia
} from '../../compartido/validaciones/esquemas';

const esquemaHuella = z.string().trim().min(1).max(512);
const textoOpcional = (max: number) => z.string().trim().max(max).nullable().optional();

export const esquemaValidarLicencia = z.object({
  license_key: esquemaClaveLicencia,
  machine_fingerprint: esquemaHuella,
  device_id: esquemaIdDispositivo.nullable().optional(),
  app_version: textoOpcional(64)
});

export const esquemaDesactivarLicencia = z.object({
  license_key: esquemaClaveLicencia,
  machine_fingerprint: esquemaHuella
});

const esquemaMaxMaquinas = z.number().int().min(1).max(1000);
const esquemaDuracionDias = z.number().int().min(1).max(36_500);

export const esquemaCrearLicencia = z
  .object({
    email: z.string().trim().toLowerCase().email().max(254).nullable().optional(),
    name: textoOpcional(200),
    license_type: esquemaTipoLicencia.default('standard'),
    max_machines: esquemaMaxMaquinas.default(1),
    duration_days: esquemaDuracionDias.nullable().optional(),
    features: esquemaFunciones.default([]),
    notes: textoOpcional(2000),
    custom_message: textoOpcional(500)
  })
  .strict();

export const esquemaGenerarLote = z
  .object({
    count: z.number().int().min(1).max(1000),
    license_type: esquemaTipoLicencia.default('standard'),
    max_machines: esquemaMaxMaquinas.default(1),
    duration_days: esquemaDuracionDias.nullable().optional(),
    features: esquemaFunciones.default([])
  })
  .strict();

export const esquemaActualizarLicencia = z
  .object({
    email: z.string().trim().toLowerCase().email().max(254).nullable().optional(),
    name: textoOpcional(200),
    license_type: esquemaTipoLicencia.optional(),
    max_machines: esquemaMaxMaquinas.optional(),
    features: esquemaFunciones.optional(),
    active: z.boolean().optional(),
    notes: textoOpcional(2000),
    custom_message: textoOpcional(500),
    expires_at: z.coerce.date().nullable().optional()
  })
  .strict()
  .refine((datos) => Object.values(datos).some((valor) => valor !== undefined), {
    message: 'Se requiere al menos un campo'
  });

export const esquemaParametrosLicencia = z.object({ key: esquemaClaveLicencia });

export type EntradaValidarLicencia = z.infer<typeof esquemaValidarLicencia>;
export type EntradaDesactivarLicencia = z.infer<typeof esquemaDesactivarLicencia>;
export type EntradaCrearLicencia = z.infer<typeof esquemaCrearLicencia>;
export type EntradaGenerarLote = z.infer<typeof esquemaGenerarLote>;
export type EntradaActualizarLicencia = z.infer<typeof esquemaActualizarLicencia>;
