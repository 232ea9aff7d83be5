/**
 * Repositorios en memoria con la misma interfaz que los de Mongo.
 *
 * Cada operacion cede el event loop una vez antes de leer y mutar en un solo paso sincrono, igual
 * que una actualizacion atomica de documento: dos llamadas concurrentes se intercalan entre
 * operaciones, nunca dentro de una.
 */
import type { ConfiguracionApi } from '../../src/configuracion';
import { configuracion } from '../../src/configuracion';
import type { Reloj } from '../../src/compartido/tipos/reloj';
import type { DependenciasApp } from '../../src/dependencias';
import type { RegistroActividad, RepositorioActividad } from '../../src/modulos/modulo_auditoria/shared/tiposActividad';
import type {
  Dispositivo,
  EstadoDispositivo,
  RepositorioDispositivos,
  ResultadoCambioEstado,
  VisitaDispositivo
} from '../../src/modulos/modulo_dispositivos/shared/tiposDispositivos';
import type {
  Activacion,
  CambiosLicencia,
  Licencia,
  NuevaLicencia,
  RepositorioActivaciones,
  RepositorioLicencias,
  ResultadoVinculacion
} from '../../src/modulos/modulo_licencias/shared/tiposLicencias';

const ceder = () => new Promise<void>((resolve) => setImmediate(resolve));

const copiarLicencia = (licencia: Licencia): Licencia => ({
  ...licencia,
  maquinasVinculadas: [...licencia.maquinasVinculadas],
  funciones: [...licencia.funciones]
});

export class RepositorioLicenciasMemoria implements RepositorioLicencias {
  readonly datos = new Map<string, Licencia>();

  async buscarPorClave(clave: string): Promise<Licencia | null> {
    await ceder();
    const licencia = this.datos.get(clave);
    return licencia ? copiarLicencia(licencia) : null;
  }

  async listar(): Promise<Licencia[]> {
    await ceder();
    return [...this.datos.values()].map(copiarLicencia);
  }

  async crear(licencias: NuevaLicencia[]): Promise<Licencia[]> {
    await ceder();
    for (const nueva of licencias) {
      if (this.datos.has(nueva.clave)) throw new Error(`Clave duplicada: ${nueva.clave}`);
    }
    return licencias.map((nueva) => {
      const licencia: Licencia = {
        ...nueva,
        funciones: [...nueva.funciones],
        maquinasVinculadas: [],
        ultimoContactoEn: null,
        ultimaIp: null,
        ultimaVersion: null
      };
      this.datos.set(licencia.clave, licencia);
      return copiarLicencia(licencia);
    });
  }

  async actualizar(clave: string, cambios: CambiosLicencia): Promise<Licencia | null> {
    await ceder();
    const licencia = this.datos.get(clave);
    if (!licencia) return null;
    Object.assign(licencia, cambios);
    return copiarLicencia(licencia);
  }

  async alternarActiva(clave: string): Promise<boolean | null> {
    await ceder();
    const licencia = this.datos.get(clave);
    if (!licencia) return null;
    licencia.activa = !licencia.activa;
    return licencia.activa;
  }

  async eliminar(clave: string): Promise<boolean> {
    await ceder();
    return this.datos.delete(clave);
  }

  async vincularMaquina(clave: string, hashMaquina: string): Promise<ResultadoVinculacion> {
    await ceder();
    const licencia = this.datos.get(clave);
    if (!licencia) return 'licencia_inexistente';
    if (licencia.maquinasVinculadas.includes(hashMaquina)) return 'ya_vinculada';
    if (licencia.maquinasVinculadas.length >= licencia.maxMaquinas) return 'sin_cupo';
    licencia.maquinasVinculadas.push(hashMaquina);
    return 'vinculada';
  }

  async desvincularMaquina(clave: string, hashMaquina: string): Promise<boolean> {
    await ceder();
    const licencia = this.datos.get(clave);
    if (!licencia || !licencia.maquinasVinculadas.includes(hashMaquina)) return false;
    licencia.maquinasVinculadas = licencia.maquinasVinculadas.filter((hash) => hash !== hashMaquina);
    return true;
  }

  async limpiarMaquinas(clave: string): Promise<boolean> {
    await ceder();
    const licencia = this.datos.get(clave);
    if (!licencia) return false;
    licencia.maquinasVinculadas = [];
    return true;
  }

  async registrarContacto(clave: string, datos: { en: Date; ip: string | null; version: string | null }): Promise<void> {
    await ceder();
    const licencia = this.datos.get(clave);
    if (!licencia) return;
    licencia.ultimoContactoEn = datos.en;
    licencia.ultimaIp = datos.ip;
    licencia.ultimaVersion = datos.version;
  }

  async desactivarExpiradas(ahora: Date): Promise<number> {
    await ceder();
    let cantidad = 0;
    for (const licencia of this.datos.values()) {
      if (licencia.activa && licencia.expiraEn && licencia.expiraEn.getTime() < ahora.getTime()) {
        licencia.activa = false;
        cantidad += 1;
      }
    }
    return cantidad;
  }
}

export class RepositorioActivacionesMemoria implements RepositorioActivaciones {
  readonly datos: Activacion[] = [];

  async registrar(activacion: Activacion): Promise<void> {
    await ceder();
    const existe = this.datos.some((a) => a.clave === activacion.clave && a.hashMaquina === activacion.hashMaquina);
    if (!existe) this.datos.push({ ...activacion });
  }

  async listar(): Promise<Activacion[]> {
    await ceder();
    return this.datos.map((a) => ({ ...a }));
  }

  async eliminar(clave: string, hashMaquina: string): Promise<boolean> {
    await ceder();
    const indice = this.datos.findIndex((a) => a.clave === clave && a.hashMaquina === hashMaquina);
    if (indice < 0) return false;
    this.datos.splice(indice, 1);
    return true;
  }

  async eliminarPorClave(clave: string): Promise<number> {
    await ceder();
    const antes = this.datos.length;
    const restantes = this.datos.filter((a) => a.clave !== clave);
    this.datos.splice(0, this.datos.length, ...restantes);
    return antes - restantes.length;
  }
}

export class RepositorioDispositivosMemoria implements RepositorioDispositivos {
  readonly datos = new Map<string, Dispositivo>();

  async buscar(idDispositivo: string): Promise<Dispositivo | null> {
    await ceder();
    const dispositivo = this.datos.get(idDispositivo);
    return dispositivo ? { ...dispositivo } : null;
  }

  async registrarVisita(idDispositivo: string, visita: VisitaDispositivo): Promise<Dispositivo> {
    await ceder();
    const existente = this.datos.get(idDispositivo);
    const dispositivo: Dispositivo = existente ?? {
      idDispositivo,
      claveLicencia: null,
      estado: 'visitor',
      primerContactoEn: visita.en,
      ultimoContactoEn: visita.en,
      ultimaIp: null,
      visitas: 0,
      intentosFallidos: 0,
      razonBaneo: null,
      baneadoEn: null
    };
    dispositivo.visitas += 1;
    dispositivo.ultimoContactoEn = visita.en;
    dispositivo.ultimaIp = visita.ip;
    if (visita.claveLicencia) dispositivo.claveLicencia = visita.claveLicencia;
    this.datos.set(idDispositivo, dispositivo);
    return { ...dispositivo };
  }

  async registrarIntentoFallido(idDispositivo: string): Promise<number> {
    await ceder();
    const dispositivo = this.datos.get(idDispositivo);
    if (!dispositivo) return 0;
    dispositivo.intentosFallidos += 1;
    return dispositivo.intentosFallidos;
  }

  async actualizarEstadoSi(idDispositivo: string, permitidos: readonly EstadoDispositivo[], nuevo: EstadoDispositivo): Promise<boolean> {
    await ceder();
    const dispositivo = this.datos.get(idDispositivo);
    if (!dispositivo || !permitidos.includes(dispositivo.estado) || dispositivo.estado === nuevo) return false;
    dispositivo.estado = nuevo;
    return true;
  }

  async fijarEstado(
    idDispositivo: string,
    cambio: { estado: EstadoDispositivo; razon: string | null; en: Date; reiniciarIntentos: boolean }
  ): Promise<ResultadoCambioEstado> {
    await ceder();
    const existente = this.datos.get(idDispositivo);
    const estadoAnterior = existente?.estado ?? null;
    const dispositivo: Dispositivo = existente ?? {
      idDispositivo,
      claveLicencia: null,
      estado: 'visitor',
      primerContactoEn: cambio.en,
      ultimoContactoEn: cambio.en,
      ultimaIp: null,
      visitas: 0,
      intentosFallidos: 0,
      razonBaneo: null,
      baneadoEn: null
    };
    const baneado = cambio.estado === 'banned';
    dispositivo.estado = cambio.estado;
    dispositivo.razonBaneo = baneado ? cambio.razon : null;
    dispositivo.baneadoEn = baneado ? cambio.en : null;
    if (cambio.reiniciarIntentos) dispositivo.intentosFallidos = 0;
    this.datos.set(idDispositivo, dispositivo);
    return { estadoAnterior, dispositivo: { ...dispositivo } };
  }

  async listar(estado?: EstadoDispositivo): Promise<Dispositivo[]> {
    await ceder();
    return [...this.datos.values()].filter((d) => !estado || d.estado === estado).map((d) => ({ ...d }));
  }

  async contarPorEstado(): Promise<Record<string, number>> {
    await ceder();
    const conteo: Record<string, number> = {};
    for (const d of this.datos.values()) conteo[d.estado] = (conteo[d.estado] ?? 0) + 1;
    return conteo;
  }
}

export class RepositorioActividadMemoria implements RepositorioActividad {
  readonly datos: RegistroActividad[] = [];

  async registrar(registro: RegistroActividad): Promise<void> {
    await ceder();
    this.datos.push({ ...registro });
  }

  async listarRecientes(limite: number): Promise<RegistroActividad[]> {
    await ceder();
    return [...this.datos].reverse().slice(0, limite);
  }

  async contarDesde(desde: Date): Promise<number> {
    await ceder();
    return this.datos.filter((r) => r.registradoEn.getTime() >= desde.getTime()).length;
  }
}

/** Reloj manual: `avanzar` mueve la hora sin timers. */
export class RelojFijo implements Reloj {
  constructor(private actual: Date) {}

  now(): Date {
    return new Date(this.actual.getTime());
  }

  avanzar(ms: number) {
    this.actual = new Date(this.actual.getTime() + ms);
  }
}

export type EntornoMemoria = DependenciasApp & {
  licencias: RepositorioLicenciasMemoria;
  activaciones: RepositorioActivacionesMemoria;
  dispositivos: RepositorioDispositivosMemoria;
  actividad: RepositorioActividadMemoria;
  reloj: RelojFijo;
};

export function crearEntornoMemoria(ajustes: Partial<ConfiguracionApi> = {}): EntornoMemoria {
  return {
    licencias: new RepositorioLicenciasMemoria(),
    activaciones: new RepositorioActivacionesMemoria(),
    dispositivos: new RepositorioDispositivosMemoria(),
    actividad: new RepositorioActividadMemoria(),
    reloj: new RelojFijo(new Date('2026-03-01T12:00:00.000Z')),
    configuracion: { ...configuracion, ...ajustes }
  };
}

export function licenciaDePrueba(clave: string, ajustes: Partial<NuevaLicencia> = {}): NuevaLicencia {
  return {
    clave,
    correo: null,
    nombre: null,
    tipoLicencia: 'standard',
    maxMaquinas: 1,
    funciones: [],
    activa: true,
    creadaEn: new Date('2026-01-01T00:00:00.000Z'),
    expiraEn: null,
    mensajePersonalizado: null,
    notas: null,
    ...ajustes
  };
}
