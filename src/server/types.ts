/**
 * Express.Request augmentation
 */

export {};

declare global {
  namespace Express {
    interface Request {
      /** UUID v4 assigned by the request-id middleware */
      requestId?: string;
    }
  }
}
