/**
 * Motor de respaldo: ZXing (`@zxing/library`), lector multiformato.
 *
 * No entrega esquinas del simbolo; la caja se arma con los puntos de
 * resultado (patrones localizadores en QR, extremos de linea en 1D).
 */
import {
  BarcodeFormat,
  BinaryBitmap,
  ChecksumException,
  DecodeHintType,
  FormatException,
  HybridBinarizer,
  MultiFormatReader,
  NotFoundException,
  RGBLuminanceSource,
  type Result
} from '@zxing/library';
import { aEscalaGrises } from '../preprocesamiento/preprocesadorImagen';
import type { Imagen, MotorCodigoBarras, SimboloDecodificado } from '../tiposEscaneo';
import { cajaDePuntos } from './geometria';

function esLecturaVacia(error: unknown) {
  return error instanceof NotFoundException || error instanceof ChecksumException || error instanceof FormatException;
}

export class MotorZxing implements MotorCodigoBarras {
  readonly nombre = 'zxing';
  readonly reportaGeometria = false;

  disponible() {
    return typeof MultiFormatReader === 'function';
  }

  decodificar(imagen: Imagen): SimboloDecodificado[] {
    const gris = aEscalaGrises(imagen);
    const fuente = new RGBLuminanceSource(gris.datos, gris.ancho, gris.alto);
    const mapa = new BinaryBitmap(new HybridBinarizer(fuente));
    const pistas = new Map<DecodeHintType, unknown>();
    pistas.set(DecodeHintType.TRY_HARDER, true);

    const lector = new MultiFormatReader();
    let resultado: Result;
    try {
      resultado = lector.decode(mapa, pistas);
    } catch (error) {
      if (esLecturaVacia(error)) return [];
      throw error;
    }

    const texto = resultado.getText();
    if (!texto) return [];

    const formato = resultado.getBarcodeFormat();
    const puntos = resultado.getResultPoints().map((p) => ({ x: p.getX(), y: p.getY() }));
    const esQr = formato === BarcodeFormat.QR_CODE;
    return [
      Object.freeze({
        texto,
        formato: esQr ? 'QR' : 'OTRO',
        formatoOriginal: esQr ? undefined : BarcodeFormat[formato],
        cajaDelimitadora: puntos.length > 0 ? Object.freeze(cajaDePuntos(puntos, gris.ancho, gris.alto)) : undefined,
        motor: this.nombre
      })
    ];
  }
}
