/**
 * clienteServidorLicencias
 *
 * Responsabilidad: Llamadas HTTP al servidor de licencias (validate, status, deactivate) con timeout acotado.
 * Limites: Red caida, timeout, 429, 5xx o cuerpo ilegible son `ErrorTransitorio`; otros 4xx son `ErrorRemoto`.
 */
import type { z } from 'zod';
import type { ConfiguracionCliente } from '../configuracion';
import {
  esquemaErrorServidor,
  esquemaRespuestaDesactivacion,
  esquemaRespuestaEstado,
  esquemaRespuestaValidacion
} from './contratos';

export type DetalleErrorRemoto = {
  status?: number;
  codigo?: string;
  mensaje?: string;
  detalles?: unknown;
};

export class ErrorRemoto extends Error {
  detalle: DetalleErrorRemoto;

  constructor(mensaje: string, detalle: DetalleErrorRemoto = {}) {
    super(mensaje);
    this.name = 'ErrorRemoto';
    this.detalle = detalle;
  }
}

export class ErrorTransitorio extends Error {
  status?: number;

  constructor(mensaje: string, opciones: { status?: number; cause?: unknown } = {}) {
    super(mensaje, { cause: opciones.cause });
    this.name = 'ErrorTransitorio';
    this.status = opciones.status;
  }
}

export type SolicitudValidacionCliente = {
  clave: string;
  huella: string;
  idDispositivo: string;
  versionApp: string;
};

type Fetch = typeof fetch;

function esAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function parsearJson(texto: string): unknown {
  try {
    return JSON.parse(texto);
  } catch {
    return undefined;
  }
}

export function crearClienteServidorLicencias(configuracion: ConfiguracionCliente, fetchImpl: Fetch = fetch) {
  async function postJson<E extends z.ZodTypeAny>(ruta: string, cuerpo: Record<string, unknown>, esquema: E): Promise<z.output<E>> {
    const controlador = new AbortController();
    const temporizador = setTimeout(() => controlador.abort(), configuracion.timeoutMs);

    let status: number;
    let ok: boolean;
    let texto: string;
    try {
      const respuesta = await fetchImpl(`${configuracion.urlServidor}${ruta}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(cuerpo),
        signal: controlador.signal
      });
      status = respuesta.status;
      ok = respuesta.ok;
      texto = await respuesta.text();
    } catch (error) {
      if (esAbortError(error)) {
        throw new ErrorTransitorio(`Tiempo de espera agotado (${configuracion.timeoutMs} ms) en ${ruta}`, { cause: error });
      }
      throw new ErrorTransitorio(`Fallo de red en ${ruta}`, { cause: error });
    } finally {
      clearTimeout(temporizador);
    }

    if (status >= 500 || status === 429) {
      throw new ErrorTransitorio(`El servidor respondio ${status} en ${ruta}`, { status });
    }

    const datos = parsearJson(texto);
    if (!ok) {
      const envoltura = esquemaErrorServidor.safeParse(datos);
      const error: Omit<DetalleErrorRemoto, 'status'> = envoltura.success ? envoltura.data.error : {};
      throw new ErrorRemoto(error.mensaje ?? `Solicitud rechazada (${status})`, {
        status,
        codigo: error.codigo,
        mensaje: error.mensaje,
        detalles: error.detalles
      });
    }
    if (datos === undefined) {
      throw new ErrorTransitorio(`Respuesta no JSON en ${ruta}`, { status });
    }

    const resultado = esquema.safeParse(datos);
    if (!resultado.success) {
      throw new ErrorTransitorio(`Respuesta con formato inesperado en ${ruta}`, { status, cause: resultado.error });
    }
    return resultado.data;
  }

  return {
    validar(solicitud: SolicitudValidacionCliente) {
      return postJson(
        '/api/validate',
        {
          license_key: solicitud.clave,
          machine_fingerprint: solicitud.huella,
          device_id: solicitud.idDispositivo,
          app_version: solicitud.versionApp
        },
        esquemaRespuestaValidacion
      );
    },

    consultarEstado(idDispositivo: string) {
      return postJson('/api/status', { device_id: idDispositivo }, esquemaRespuestaEstado);
    },

    desactivar(clave: string, huella: string) {
      return postJson('/api/deactivate', { license_key: clave, machine_fingerprint: huella }, esquemaRespuestaDesactivacion);
    }
  };
}

export type ClienteServidorLicencias = ReturnType<typeof crearClienteServidorLicencias>;
