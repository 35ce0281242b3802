/**
 * Tipos del diseñador de QR.
 *
 * `SolicitudRenderQr` es el unico insumo del motor de render: todos sus campos
 * llegan acotados y con default aplicado por `validarOpcionesDiseno`.
 */
export const DIBUJANTES_MODULO = ['square', 'rounded', 'circle', 'gapped_square'] as const;
export const MASCARAS_COLOR = [
  'solid',
  'radial_gradient',
  'square_gradient',
  'horizontal_gradient',
  'vertical_gradient'
] as const;
export const NIVELES_CORRECCION = ['L', 'M', 'Q', 'H'] as const;
export const POSICIONES_LOGO = ['center', 'top-left', 'top-right', 'bottom-left', 'bottom-right'] as const;
export const POSICIONES_TEXTO = ['top', 'center', 'bottom'] as const;

export type DibujanteModulo = (typeof DIBUJANTES_MODULO)[number];
export type MascaraColor = (typeof MASCARAS_COLOR)[number];
export type NivelCorreccion = (typeof NIVELES_CORRECCION)[number];
export type PosicionLogo = (typeof POSICIONES_LOGO)[number];
export type PosicionTexto = (typeof POSICIONES_TEXTO)[number];

/** Capacidad maxima de un QR version 40 (bytes, nivel L). */
export const MAXIMO_CARACTERES_QR = 2953;

/** `#RRGGBB` en mayusculas. */
export type ColorHex = string;

export type Rgb = { r: number; g: number; b: number };

export type LogoRender = {
  imagen: Buffer;
  /** Lado del cuadro del logo; sin valor se usa 20% del tamano del QR. */
  tamanoPx?: number;
  posicion: PosicionLogo;
};

export type DecoracionesRender = {
  marco?: { ancho: number; color: ColorHex };
  sombra?: { desplazamiento: number; color: ColorHex; opacidad: number };
  texto?: { contenido: string; color: ColorHex; tamano: number; posicion: PosicionTexto };
};

export type SolicitudRenderQr = {
  datos: string;
  tamano: number;
  borde: number;
  correccionErrores: NivelCorreccion;
  colorRelleno: ColorHex;
  colorFondo: ColorHex;
  dibujanteModulo: DibujanteModulo;
  mascaraColor: MascaraColor;
  radioEsquina: number;
  logo?: LogoRender;
  fondo?: Buffer;
  decoraciones?: DecoracionesRender;
};

export type MetadatosRender = {
  datos: string;
  correccionErrores: NivelCorreccion;
  dibujanteModulo: DibujanteModulo;
  mascaraColor: MascaraColor;
  tieneLogo: boolean;
  tieneFondo: boolean;
  decoraciones: boolean;
  version: number;
  modulos: number;
};

export type ImagenRenderizada = {
  png: Buffer;
  ancho: number;
  alto: number;
  formato: 'PNG';
  metadatos: MetadatosRender;
};
