/**
 * Validador de opciones de diseño.
 *
 * Nunca falla por un valor fuera de rango ni por un enum desconocido: acota o
 * aplica default. Solo los datos vacios o demasiado largos son error de
 * entrada. Cada enum reemplazado por su default queda en `advertencias` y en
 * la metrica `qrapi_style_defaulted_total`.
 */
import { parsearNumeroSeguro } from '../../configuracion';
import { registrarAdvertenciaEstilo } from '../../compartido/observabilidad/metrics';
import { exito, fallo, type Resultado } from '../../compartido/tipos/resultado';
import { validarDatosQr } from './datosQr';
import {
  DIBUJANTES_MODULO,
  MASCARAS_COLOR,
  NIVELES_CORRECCION,
  POSICIONES_LOGO,
  POSICIONES_TEXTO,
  type ColorHex,
  type DecoracionesRender,
  type SolicitudRenderQr
} from './tiposDiseno';

export type EstiloCrudo = {
  anchoMarco?: unknown;
  colorMarco?: unknown;
  sombra?: unknown;
  desplazamientoSombra?: unknown;
  colorSombra?: unknown;
  opacidadSombra?: unknown;
  texto?: unknown;
  colorTexto?: unknown;
  tamanoTexto?: unknown;
  posicionTexto?: unknown;
};

export type OpcionesDisenoCrudas = {
  datos?: unknown;
  tamano?: unknown;
  borde?: unknown;
  correccionErrores?: unknown;
  colorRelleno?: unknown;
  colorFondo?: unknown;
  dibujanteModulo?: unknown;
  mascaraColor?: unknown;
  radioEsquina?: unknown;
  logo?: Buffer;
  tamanoLogo?: unknown;
  posicionLogo?: unknown;
  fondo?: Buffer;
  estilo?: EstiloCrudo;
};

export type AdvertenciaEstilo = {
  campo: string;
  valorRecibido: string;
  valorAplicado: string;
};

export type SolicitudValidada = {
  solicitud: SolicitudRenderQr;
  advertencias: AdvertenciaEstilo[];
};

export const LIMITES_DISENO = {
  tamano: { min: 100, max: 2000, porDefecto: 300 },
  borde: { min: 0, max: 20, porDefecto: 4 },
  radioEsquina: { min: 0, max: 10, porDefecto: 0 },
  tamanoLogo: { min: 20, max: 200, porDefecto: 60 },
  anchoMarco: { min: 0, max: 50 },
  desplazamientoSombra: { min: 1, max: 20, porDefecto: 5 },
  opacidadSombra: { min: 0.1, max: 1, porDefecto: 0.3 },
  tamanoTexto: { min: 10, max: 50, porDefecto: 20 },
  longitudTexto: 100
} as const;

function entero(valor: unknown, limites: { min: number; max: number; porDefecto: number }) {
  return Math.trunc(parsearNumeroSeguro(valor, limites.porDefecto, limites));
}

/**
 * Antepone `#`, descarta caracteres no hexadecimales, expande `#RGB`. Cualquier
 * otra longitud produce `#000000`.
 */
export function normalizarColor(valor: unknown, porDefecto: ColorHex = '#000000'): ColorHex {
  const texto = typeof valor === 'string' ? valor : porDefecto;
  const conPrefijo = texto.startsWith('#') ? texto : `#${texto}`;
  const digitos = conPrefijo.slice(1).replace(/[^0-9A-Fa-f]/g, '');
  if (digitos.length === 3) {
    return `#${digitos[0]}${digitos[0]}${digitos[1]}${digitos[1]}${digitos[2]}${digitos[2]}`.toUpperCase();
  }
  if (digitos.length !== 6) return '#000000';
  return `#${digitos}`.toUpperCase();
}

function elegirEnum<T extends string>(
  valor: unknown,
  permitidos: readonly T[],
  porDefecto: T,
  campo: string,
  advertencias: AdvertenciaEstilo[],
  normalizar: (texto: string) => string = (texto) => texto
): T {
  if (valor === undefined || valor === null || valor === '') return porDefecto;
  const candidato = typeof valor === 'string' ? normalizar(valor) : '';
  const elegido = permitidos.find((permitido) => permitido === candidato);
  if (elegido) return elegido;
  advertencias.push({ campo, valorRecibido: String(valor), valorAplicado: porDefecto });
  registrarAdvertenciaEstilo(campo);
  return porDefecto;
}

function validarDecoraciones(estilo: EstiloCrudo, advertencias: AdvertenciaEstilo[]): DecoracionesRender | undefined {
  const decoraciones: DecoracionesRender = {};

  const anchoMarco = Math.trunc(parsearNumeroSeguro(estilo.anchoMarco, 0, LIMITES_DISENO.anchoMarco));
  if (anchoMarco > 0) {
    decoraciones.marco = { ancho: anchoMarco, color: normalizarColor(estilo.colorMarco) };
  }

  if (estilo.sombra === true) {
    decoraciones.sombra = {
      desplazamiento: entero(estilo.desplazamientoSombra, LIMITES_DISENO.desplazamientoSombra),
      color: normalizarColor(estilo.colorSombra),
      opacidad: parsearNumeroSeguro(
        estilo.opacidadSombra,
        LIMITES_DISENO.opacidadSombra.porDefecto,
        LIMITES_DISENO.opacidadSombra
      )
    };
  }

  if (typeof estilo.texto === 'string' && estilo.texto.length > 0) {
    decoraciones.texto = {
      contenido: estilo.texto.slice(0, LIMITES_DISENO.longitudTexto),
      color: normalizarColor(estilo.colorTexto),
      tamano: entero(estilo.tamanoTexto, LIMITES_DISENO.tamanoTexto),
      posicion: elegirEnum(estilo.posicionTexto, POSICIONES_TEXTO, 'bottom', 'posicionTexto', advertencias)
    };
  }

  return decoraciones.marco || decoraciones.sombra || decoraciones.texto ? decoraciones : undefined;
}

export function validarOpcionesDiseno(crudo: OpcionesDisenoCrudas): Resultado<SolicitudValidada> {
  const datos = typeof crudo.datos === 'string' ? crudo.datos : '';
  const errorDatos = validarDatosQr(datos);
  if (errorDatos) return fallo('ENTRADA_INVALIDA', errorDatos);

  const advertencias: AdvertenciaEstilo[] = [];
  const solicitud: SolicitudRenderQr = {
    datos,
    tamano: entero(crudo.tamano, LIMITES_DISENO.tamano),
    borde: entero(crudo.borde, LIMITES_DISENO.borde),
    correccionErrores: elegirEnum(crudo.correccionErrores, NIVELES_CORRECCION, 'M', 'correccionErrores', advertencias, (t) =>
      t.toUpperCase()
    ),
    colorRelleno: normalizarColor(crudo.colorRelleno, '#000000'),
    colorFondo: normalizarColor(crudo.colorFondo, '#FFFFFF'),
    dibujanteModulo: elegirEnum(crudo.dibujanteModulo, DIBUJANTES_MODULO, 'square', 'dibujanteModulo', advertencias),
    mascaraColor: elegirEnum(crudo.mascaraColor, MASCARAS_COLOR, 'solid', 'mascaraColor', advertencias),
    radioEsquina: entero(crudo.radioEsquina, LIMITES_DISENO.radioEsquina)
  };

  if (crudo.logo && crudo.logo.length > 0) {
    solicitud.logo = {
      imagen: crudo.logo,
      tamanoPx: entero(crudo.tamanoLogo, LIMITES_DISENO.tamanoLogo),
      posicion: elegirEnum(crudo.posicionLogo, POSICIONES_LOGO, 'center', 'posicionLogo', advertencias)
    };
  }
  if (crudo.fondo && crudo.fondo.length > 0) {
    solicitud.fondo = crudo.fondo;
  }
  if (crudo.estilo) {
    const decoraciones = validarDecoraciones(crudo.estilo, advertencias);
    if (decoraciones) solicitud.decoraciones = decoraciones;
  }

  return exito({ solicitud, advertencias });
}
