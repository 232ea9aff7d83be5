// Esquemas Zod reutilizables (contratos HTTP).
import { z } from 'zod';

export const TIPOS_LICENCIA = ['trial', 'standard', 'pro', 'enterprise'] as const;
export const ESTADOS_DISPOSITIVO = ['visitor', 'active', 'suspicious', 'hacking', 'banned'] as const;

// Las claves se comparan siempre en mayusculas y sin espacios.
export const esquemaClaveLicencia = z
  .string()
  .trim()
  .min(1)
  .max(128)
  .transform((valor) => valor.toUpperCase());

export const esquemaIdDispositivo = z.string().trim().min(1).max(256);

export const esquemaTipoLicencia = z.enum(TIPOS_LICENCIA);

export const esquemaEstadoDispositivo = z.enum(ESTADOS_DISPOSITIVO);

export const esquemaFunciones = z.array(z.string().trim().min(1).max(64)).max(50);
