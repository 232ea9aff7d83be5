/**
 * Validaciones de estado de dispositivos.
 */
import { z } from 'zod';
import { esquemaEstadoDispositivo, esquemaIdDispositivo } from '../../compartido/validaciones/esquemas';

const esquemaRazon = z.string().trim().max(500).nullable().optional();

export const esquemaConsultarEstado = z.object({
  device_id: esquemaIdDispositivo
});

export const esquemaBanear = z.object({ reason: esquemaRazon }).strict();

export const esquemaCambiarEstado = z
  .object({
    status: esquemaEstadoDispositivo,
    reason: esquemaRazon
  })
  .strict();

export const esquemaParametrosDispositivo = z.object({ id: esquemaIdDispositivo });

export const esquemaFiltroDispositivos = z.object({
  status: esquemaEstadoDispositivo.optional()
});

export type EntradaConsultarEstado = z.infer<typeof esquemaConsultarEstado>;
export type EntradaBanear = z.infer<typeof esquemaBanear>;
export type EntradaCambiarEstado = z.infer<typeof esquemaCambiarEstado>;
