/**
 * Tipos del modulo de escaneo QR.
 */
export type CanalesImagen = 1 | 3 | 4;

/**
 * Raster en memoria. `datos` va intercalado por pixel (`canales` bytes cada uno).
 */
export type Imagen = {
  datos: Uint8ClampedArray;
  ancho: number;
  alto: number;
  canales: CanalesImagen;
};

export type Punto = { x: number; y: number };

export type CajaDelimitadora = { x: number; y: number; ancho: number; alto: number };

export type FormatoSimbolo = 'QR' | 'OTRO';

export type SimboloDecodificado = Readonly<{
  texto: string;
  formato: FormatoSimbolo;
  /** Nombre del formato segun el motor (p. ej. `CODE_128`) cuando no es QR. */
  formatoOriginal?: string;
  cajaDelimitadora?: Readonly<CajaDelimitadora>;
  poligono?: ReadonlyArray<Readonly<Punto>>;
  motor: string;
}>;

export type IntentoDecodificacion = { motor: string; pasada: string };

/**
 * Exactamente uno de `simbolos` (no vacio) o `mensajeError` es significativo.
 */
export type ResultadoDecodificacion = {
  simbolos: SimboloDecodificado[];
  mensajeError?: string;
  intento?: IntentoDecodificacion;
};

/**
 * Motor de lectura de codigos. Un motor que lanza se trata como "sin simbolos"
 * para ese intento.
 */
export interface MotorCodigoBarras {
  readonly nombre: string;
  /** `true` si el motor devuelve las cuatro esquinas del simbolo. */
  readonly reportaGeometria: boolean;
  disponible(): boolean;
  decodificar(imagen: Imagen): SimboloDecodificado[];
}

export const MENSAJE_SIN_QR =
  'No se encontró ningún código QR en la imagen. Intenta con una imagen más nítida y con mejor contraste.';
export const MENSAJE_IMAGEN_ILEGIBLE = 'No se pudo leer el archivo de imagen';
