/**
 * Matriz de modulos del QR (sin zona de silencio) via `qrcode`.
 *
 * La version minima que admite los datos al nivel pedido se elige sola. Si no
 * existe ninguna (datos > capacidad del nivel) el resultado es
 * `CAPACIDAD_EXCEDIDA`.
 */
import QRCode from 'qrcode';
import { exito, fallo, type Resultado } from '../../compartido/tipos/resultado';
import type { NivelCorreccion } from './tiposDiseno';

export type MatrizQr = {
  version: number;
  tamano: number;
  esOscuro(fila: number, columna: number): boolean;
};

export function construirMatriz(datos: string, nivel: NivelCorreccion): Resultado<MatrizQr> {
  let qr: ReturnType<typeof QRCode.create>;
  try {
    qr = QRCode.create(datos, { errorCorrectionLevel: nivel });
  } catch (error) {
    const mensaje = error instanceof Error ? error.message : String(error);
    return fallo('CAPACIDAD_EXCEDIDA', `Los datos no caben en un QR con correccion ${nivel}: ${mensaje}`);
  }

  const { modules, version } = qr;
  return exito({
    version,
    tamano: modules.size,
    esOscuro(fila: number, columna: number) {
      if (fila < 0 || columna < 0 || fila >= modules.size || columna >= modules.size) return false;
      return modules.get(fila, columna) === 1;
    }
  });
}
