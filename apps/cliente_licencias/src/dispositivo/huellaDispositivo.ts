/**
 * huellaDispositivo
 *
 * Responsabilidad: Huella estable del equipo (host, arquitectura, CPU, plataforma y MAC).
 * Limites: Ni el servidor ni el id de dispositivo por defecto guardan la huella cruda; solo su hash salado.
 */
import { createHash } from 'node:crypto';
import os from 'node:os';

function primeraMac(): string | null {
  for (const interfaces of Object.values(os.networkInterfaces())) {
    for (const info of interfaces ?? []) {
      if (!info.internal && info.mac && info.mac !== '00:00:00:00:00:00') return info.mac;
    }
  }
  return null;
}

export function componentesEquipo(): string[] {
  return [os.hostname(), os.arch(), os.cpus()[0]?.model ?? '', os.platform(), primeraMac() ?? ''];
}

export function calcularHuellaDispositivo(componentes: string[] = componentesEquipo()): string {
  const significativos = componentes.map((valor) => valor.trim()).filter(Boolean);
  return createHash('sha256').update(significativos.join('|')).digest('hex');
}

/** Mismo hash salado que el servidor usa como hash de maquina. */
export function calcularIdDispositivo(huella: string): string {
  return createHash('sha256').update(`${huella}:salt:v1`).digest('hex').slice(0, 32);
}
