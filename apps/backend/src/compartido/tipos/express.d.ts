import type { IdentidadSolicitud } from '../identidad/resolutorIdentidad';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      identidad?: IdentidadSolicitud;
    }
  }
}

export {};
