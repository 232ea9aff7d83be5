/**
 * canalEventos
 *
 * Responsabilidad: Canal tipado de eventos del monitor; la UI se suscribe y el temporizador solo publica.
 * Limites: Un oyente que falla se registra y no interrumpe al resto ni al ciclo que publico.
 */
import { EventEmitter } from 'node:events';
import { logError } from '../infraestructura/logging/logger';

export class CanalEventos<M extends Record<string, unknown>> {
  private readonly emisor = new EventEmitter();

  suscribir<K extends keyof M & string>(evento: K, oyente: (dato: M[K]) => void): () => void {
    const envoltura = (dato: M[K]) => {
      try {
        oyente(dato);
      } catch (error) {
        logError('Fallo un oyente del monitor de licencia', error, { evento });
      }
    };
    this.emisor.on(evento, envoltura);
    return () => {
      this.emisor.off(evento, envoltura);
    };
  }

  emitir<K extends keyof M & string>(evento: K, dato: M[K]) {
    this.emisor.emit(evento, dato);
  }

  cantidadOyentes(evento: keyof M & string): number {
    return this.emisor.listenerCount(evento);
  }
}
