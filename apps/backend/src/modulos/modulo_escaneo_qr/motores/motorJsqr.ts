/**
 * Motor primario: jsQR.
 *
 * Reporta el poligono de cuatro esquinas. jsQR solo entrega un simbolo por
 * llamada; para leer varios se blanquea la caja del simbolo encontrado y se
 * vuelve a buscar, hasta `maximoSimbolos`.
 */
import jsQR from 'jsqr';
import { aRgba } from '../preprocesamiento/preprocesadorImagen';
import type { CajaDelimitadora, Imagen, MotorCodigoBarras, Punto, SimboloDecodificado } from '../tiposEscaneo';
import { cajaDePuntos } from './geometria';

const MARGEN_BLANQUEO_PX = 4;

function blanquearCaja(datos: Uint8ClampedArray, ancho: number, alto: number, caja: CajaDelimitadora) {
  const x0 = Math.max(0, caja.x - MARGEN_BLANQUEO_PX);
  const y0 = Math.max(0, caja.y - MARGEN_BLANQUEO_PX);
  const x1 = Math.min(ancho, caja.x + caja.ancho + MARGEN_BLANQUEO_PX);
  const y1 = Math.min(alto, caja.y + caja.alto + MARGEN_BLANQUEO_PX);
  for (let y = y0; y < y1; y += 1) {
    datos.fill(255, (y * ancho + x0) * 4, (y * ancho + x1) * 4);
  }
}

function contienePunto(caja: CajaDelimitadora, punto: Punto) {
  return punto.x >= caja.x && punto.x <= caja.x + caja.ancho && punto.y >= caja.y && punto.y <= caja.y + caja.alto;
}

export class MotorJsqr implements MotorCodigoBarras {
  readonly nombre = 'jsqr';
  readonly reportaGeometria = true;

  constructor(private readonly maximoSimbolos = 4) {}

  disponible() {
    return typeof jsQR === 'function';
  }

  decodificar(imagen: Imagen): SimboloDecodificado[] {
    const { ancho, alto } = imagen;
    const rgba = aRgba(imagen);
    // Copia: el blanqueo no debe tocar la imagen del llamador.
    const datos = new Uint8ClampedArray(rgba.datos);
    const simbolos: SimboloDecodificado[] = [];

    for (let intento = 0; intento < this.maximoSimbolos; intento += 1) {
      const resultado = jsQR(datos, ancho, alto, { inversionAttempts: 'attemptBoth' });
      if (!resultado?.data) break;

      const { topLeftCorner, topRightCorner, bottomRightCorner, bottomLeftCorner } = resultado.location;
      const poligono: Punto[] = [topLeftCorner, topRightCorner, bottomRightCorner, bottomLeftCorner].map((p) =>
        Object.freeze({ x: p.x, y: p.y })
      );
      const caja = cajaDePuntos(poligono, ancho, alto);
      const centro = { x: caja.x + caja.ancho / 2, y: caja.y + caja.alto / 2 };
      // Si el blanqueo no alcanzo a borrar el simbolo, jsQR lo repetiria.
      if (simbolos.some((previo) => previo.cajaDelimitadora && contienePunto(previo.cajaDelimitadora, centro))) break;

      simbolos.push(
        Object.freeze({
          texto: resultado.data,
          formato: 'QR',
          cajaDelimitadora: Object.freeze(caja),
          poligono: Object.freeze(poligono),
          motor: this.nombre
        })
      );
      blanquearCaja(datos, ancho, alto, caja);
    }

    return simbolos;
  }
}
