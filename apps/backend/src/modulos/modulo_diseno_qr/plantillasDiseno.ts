/**
 * Catalogo de estilos y plantillas predefinidas del diseñador.
 */
import type { EstiloCrudo, OpcionesDisenoCrudas } from './validadorEstiloQr';
import {
  DIBUJANTES_MODULO,
  MASCARAS_COLOR,
  NIVELES_CORRECCION,
  POSICIONES_LOGO,
  POSICIONES_TEXTO,
  type DibujanteModulo,
  type MascaraColor
} from './tiposDiseno';

export type OpcionesPlantilla = {
  colorRelleno: string;
  colorFondo: string;
  dibujanteModulo: DibujanteModulo;
  mascaraColor: MascaraColor;
  borde: number;
  radioEsquina: number;
  estilo?: EstiloCrudo;
};

export type PlantillaDiseno = {
  nombre: string;
  descripcion: string;
  opciones: OpcionesPlantilla;
};

export const PLANTILLAS_DISENO = {
  minimal: {
    nombre: 'Minimalista',
    descripcion: 'Diseño limpio y simple',
    opciones: { colorRelleno: '#000000', colorFondo: '#FFFFFF', dibujanteModulo: 'square', mascaraColor: 'solid', borde: 4, radioEsquina: 0 }
  },
  rounded: {
    nombre: 'Redondeado',
    descripcion: 'Esquinas redondeadas modernas',
    opciones: { colorRelleno: '#2563EB', colorFondo: '#FFFFFF', dibujanteModulo: 'rounded', mascaraColor: 'solid', borde: 4, radioEsquina: 2 }
  },
  gradient_blue: {
    nombre: 'Degradado azul',
    descripcion: 'Degradado radial en tonos azules',
    opciones: {
      colorRelleno: '#1E3C72',
      colorFondo: '#FFFFFF',
      dibujanteModulo: 'square',
      mascaraColor: 'radial_gradient',
      borde: 4,
      radioEsquina: 0
    }
  },
  gradient_green: {
    nombre: 'Degradado verde',
    descripcion: 'Degradado radial en tonos verdes',
    opciones: {
      colorRelleno: '#11998E',
      colorFondo: '#FFFFFF',
      dibujanteModulo: 'square',
      mascaraColor: 'radial_gradient',
      borde: 4,
      radioEsquina: 0
    }
  },
  circles: {
    nombre: 'Circulos',
    descripcion: 'Modulos circulares',
    opciones: { colorRelleno: '#7C3AED', colorFondo: '#FFFFFF', dibujanteModulo: 'circle', mascaraColor: 'solid', borde: 4, radioEsquina: 0 }
  },
  gapped: {
    nombre: 'Cuadros separados',
    descripcion: 'Cuadros con separacion entre modulos',
    opciones: {
      colorRelleno: '#DC2626',
      colorFondo: '#FFFFFF',
      dibujanteModulo: 'gapped_square',
      mascaraColor: 'solid',
      borde: 4,
      radioEsquina: 0
    }
  },
  dark_mode: {
    nombre: 'Modo oscuro',
    descripcion: 'Modulos claros sobre fondo oscuro',
    opciones: { colorRelleno: '#FFFFFF', colorFondo: '#1A1A1A', dibujanteModulo: 'square', mascaraColor: 'solid', borde: 4, radioEsquina: 0 }
  },
  premium: {
    nombre: 'Premium',
    descripcion: 'Marco claro y sombra',
    opciones: {
      colorRelleno: '#1F2937',
      colorFondo: '#FFFFFF',
      dibujanteModulo: 'rounded',
      mascaraColor: 'solid',
      borde: 4,
      radioEsquina: 1,
      estilo: {
        anchoMarco: 8,
        colorMarco: '#F3F4F6',
        sombra: true,
        desplazamientoSombra: 8,
        colorSombra: '#000000',
        opacidadSombra: 0.2
      }
    }
  }
} as const satisfies Record<string, PlantillaDiseno>;

export type NombrePlantilla = keyof typeof PLANTILLAS_DISENO;

export function esNombrePlantilla(valor: string): valor is NombrePlantilla {
  return Object.prototype.hasOwnProperty.call(PLANTILLAS_DISENO, valor);
}

/**
 * Opciones de la plantilla con `extra` encima. Un campo de `extra` sin valor
 * conserva el de la plantilla; el estilo se combina campo a campo.
 */
export function aplicarPlantilla(nombre: NombrePlantilla, extra: OpcionesDisenoCrudas = {}): OpcionesDisenoCrudas {
  const base: OpcionesPlantilla = PLANTILLAS_DISENO[nombre].opciones;
  return {
    ...extra,
    colorRelleno: extra.colorRelleno ?? base.colorRelleno,
    colorFondo: extra.colorFondo ?? base.colorFondo,
    dibujanteModulo: extra.dibujanteModulo ?? base.dibujanteModulo,
    mascaraColor: extra.mascaraColor ?? base.mascaraColor,
    borde: extra.borde ?? base.borde,
    radioEsquina: extra.radioEsquina ?? base.radioEsquina,
    estilo: base.estilo || extra.estilo ? { ...base.estilo, ...extra.estilo } : undefined
  };
}

export function obtenerEstilosDisponibles() {
  return {
    dibujantesModulo: [...DIBUJANTES_MODULO],
    mascarasColor: [...MASCARAS_COLOR],
    nivelesCorreccion: [...NIVELES_CORRECCION],
    posicionesLogo: [...POSICIONES_LOGO],
    posicionesTexto: [...POSICIONES_TEXTO],
    coloresSugeridos: {
      relleno: ['#000000', '#1A1A1A', '#333333', '#666666', '#999999'],
      fondo: ['#FFFFFF', '#F8F9FA', '#E9ECEF', '#DEE2E6', '#CED4DA']
    },
    degradados: {
      azul: ['#1E3C72', '#2A5298'],
      verde: ['#11998E', '#38EF7D'],
      morado: ['#667EEA', '#764BA2'],
      naranja: ['#F093FB', '#F5576C'],
      rojo: ['#FF9A9E', '#FECFEF']
    }
  };
}
