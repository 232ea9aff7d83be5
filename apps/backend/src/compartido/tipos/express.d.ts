/**
 * Campos propios que los middlewares agregan a la request de Express.
 */
export {};

declare global {
  namespace Express {
    interface Request {
      /** Correlacion de logs (`x-request-id`). */
      requestId?: string;
    }
  }
}
