import type { CajaDelimitadora, Punto } from '../tiposEscaneo';

/**
 * Caja alineada a ejes que contiene todos los puntos, recortada a la imagen.
 * Siempre mide al menos 1x1.
 */
export function cajaDePuntos(puntos: ReadonlyArray<Punto>, ancho: number, alto: number): CajaDelimitadora {
  const xs = puntos.map((p) => p.x);
  const ys = puntos.map((p) => p.y);
  const x0 = Math.max(0, Math.floor(Math.min(...xs)));
  const y0 = Math.max(0, Math.floor(Math.min(...ys)));
  const x1 = Math.min(ancho, Math.ceil(Math.max(...xs)));
  const y1 = Math.min(alto, Math.ceil(Math.max(...ys)));
  return { x: x0, y: y0, ancho: Math.max(1, x1 - x0), alto: Math.max(1, y1 - y0) };
}
