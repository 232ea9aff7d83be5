/**
 * Fuente de tiempo inyectable (las pruebas fijan la hora).
 */
export interface Reloj {
  now(): Date;
}

export const relojSistema: Reloj = {
  now: () => new Date()
};
