/**
 * Composicion de repositorios y servicios del API.
 *
 * `crearApp` recibe estas dependencias; las pruebas sustituyen los repositorios Mongo por
 * implementaciones en memoria con la misma interfaz.
 */
import { configuracion, type ConfiguracionApi } from './configuracion';
import { relojSistema, type Reloj } from './compartido/tipos/reloj';
import { MongoRepositorioActividad } from './modulos/modulo_auditoria/infra/repositorioActividad';
import { crearServicioAuditoria } from './modulos/modulo_auditoria/servicioAuditoria';
import type { RepositorioActividad } from './modulos/modulo_auditoria/shared/tiposActividad';
import { MongoRepositorioDispositivos } from './modulos/modulo_dispositivos/infra/repositorioDispositivos';
import { crearServicioEstadoDispositivos } from './modulos/modulo_dispositivos/servicioEstadoDispositivos';
import type { RepositorioDispositivos } from './modulos/modulo_dispositivos/shared/tiposDispositivos';
import {
  MongoRepositorioActivaciones,
  MongoRepositorioLicencias
} from './modulos/modulo_licencias/infra/repositoriosLicencias';
import { crearServicioAdminLicencias } from './modulos/modulo_licencias/servicioAdminLicencias';
import { crearServicioValidacion } from './modulos/modulo_licencias/servicioValidacion';
import type { RepositorioActivaciones, RepositorioLicencias } from './modulos/modulo_licencias/shared/tiposLicencias';

export type DependenciasApp = {
  licencias: RepositorioLicencias;
  activaciones: RepositorioActivaciones;
  dispositivos: RepositorioDispositivos;
  actividad: RepositorioActividad;
  reloj: Reloj;
  configuracion: ConfiguracionApi;
};

export function crearDependenciasMongo(): DependenciasApp {
  return {
    licencias: new MongoRepositorioLicencias(),
    activaciones: new MongoRepositorioActivaciones(),
    dispositivos: new MongoRepositorioDispositivos(),
    actividad: new MongoRepositorioActividad(),
    reloj: relojSistema,
    configuracion
  };
}

export type ServiciosApp = ReturnType<typeof crearServicios>;

export function crearServicios(deps: DependenciasApp) {
  const { licencias, activaciones, dispositivos, actividad, reloj } = deps;
  const auditoria = crearServicioAuditoria({ actividad, reloj });
  const estadoDispositivos = crearServicioEstadoDispositivos({
    dispositivos,
    auditoria,
    reloj,
    politica: deps.configuracion.politicaEscalamiento
  });
  const validacion = crearServicioValidacion({ licencias, activaciones, estadoDispositivos, auditoria, reloj });
  const adminLicencias = crearServicioAdminLicencias({
    licencias,
    activaciones,
    estadoDispositivos,
    auditoria,
    reloj,
    maxLicenciasLote: deps.configuracion.maxLicenciasLote
  });
  return { auditoria, estadoDispositivos, validacion, adminLicencias };
}
