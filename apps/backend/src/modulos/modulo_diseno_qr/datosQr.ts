/**
 * Reglas sobre el contenido a codificar: validacion de longitud, estimacion de
 * version y datos de URL.
 */
import { MAXIMO_CARACTERES_QR } from './tiposDiseno';

export type InfoDatosQr = {
  longitud: number;
  esUrl: boolean;
  versionEstimada: number;
  capacidadMaxima: number;
  dominio?: string;
  esquema?: string;
  ruta?: string;
};

// [longitud maxima, version]; a partir de 396 caracteres se estima por bloques de 40.
const TABLA_VERSIONES: ReadonlyArray<readonly [number, number]> = [
  [25, 1],
  [47, 2],
  [77, 3],
  [114, 4],
  [154, 5],
  [195, 6],
  [224, 7],
  [279, 8],
  [335, 9],
  [395, 10]
];

/**
 * Mensaje de error o `undefined` si los datos se pueden codificar.
 */
export function validarDatosQr(datos: string): string | undefined {
  if (!datos || datos.trim().length === 0) return 'Los datos del QR no pueden estar vacios';
  if (datos.length > MAXIMO_CARACTERES_QR) {
    return `Los datos del QR son demasiado largos (maximo ${MAXIMO_CARACTERES_QR} caracteres)`;
  }
  return undefined;
}

/**
 * Estimacion aproximada; la version real depende del nivel de correccion.
 */
export function estimarVersionQr(longitud: number) {
  const fila = TABLA_VERSIONES.find(([maximo]) => longitud <= maximo);
  if (fila) return fila[1];
  return Math.min(40, Math.floor(longitud / 40) + 1);
}

function analizarUrl(datos: string) {
  try {
    const url = new URL(datos);
    if (!url.protocol || !url.host) return undefined;
    return { dominio: url.host, esquema: url.protocol.replace(/:$/, ''), ruta: url.pathname };
  } catch {
    return undefined;
  }
}

export function infoDatosQr(datos: string): InfoDatosQr {
  const url = analizarUrl(datos);
  return {
    longitud: datos.length,
    esUrl: Boolean(url),
    versionEstimada: estimarVersionQr(datos.length),
    capacidadMaxima: MAXIMO_CARACTERES_QR,
    ...url
  };
}
