/**
 * observabilidad
 *
 * Responsabilidad: Contratos de respuesta de los endpoints de salud.
 * Limites: Mantener nombres de campos estables para los monitores externos.
 */
export type RespuestaSalud = {
  estado: 'ok' | 'degradado';
  tiempoActivo: number;
};

export type RespuestaLiveness = RespuestaSalud & {
  servicio: string;
  env: string;
};

export type RespuestaReadiness = RespuestaSalud & {
  dependencias: {
    db: {
      estado: number;
      descripcion: string;
      lista: boolean;
    };
  };
};
