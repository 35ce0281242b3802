/**
 * Clasificacion del texto decodificado (URL, email, WiFi, vCard, ...).
 *
 * La precedencia importa: un texto con `@` y punto en el dominio se reporta
 * como email aunque despues empiece con otro prefijo reconocido.
 */
export type TipoContenido = 'url' | 'email' | 'phone' | 'wifi' | 'sms' | 'vcard' | 'geo' | 'text';

export type DatosWifi = {
  ssid?: string;
  seguridad?: string;
  contrasena?: string;
  oculta: boolean;
};

export type ClasificacionContenido = {
  tipo: TipoContenido;
  longitud: number;
  esUrl: boolean;
  esEmail: boolean;
  esTelefono: boolean;
  esWifi: boolean;
  esSms: boolean;
  esVcard: boolean;
  esGeo: boolean;
  wifi?: DatosWifi;
};

const PREFIJOS_URL = ['http://', 'https://', 'www.'];

function detectarTipo(texto: string): TipoContenido {
  if (PREFIJOS_URL.some((prefijo) => texto.startsWith(prefijo))) return 'url';
  const dominio = texto.split('@')[1];
  if (dominio !== undefined && dominio.includes('.')) return 'email';
  if (texto.startsWith('tel:')) return 'phone';
  if (texto.startsWith('WIFI:')) return 'wifi';
  if (texto.startsWith('sms:')) return 'sms';
  if (texto.startsWith('BEGIN:VCARD')) return 'vcard';
  const minusculas = texto.toLowerCase();
  if (minusculas.includes('geo:') || minusculas.includes('latitude')) return 'geo';
  return 'text';
}

function desescapar(valor: string) {
  return valor.replace(/\\([\\;,:"])/g, '$1');
}

/**
 * `WIFI:T:WPA;S:MiRed;P:clave;H:false;` -> campos. Cada segmento se parte en
 * el primer `:`; los `\;` escapados no separan segmentos.
 */
export function parsearWifi(texto: string): DatosWifi | undefined {
  if (!texto.startsWith('WIFI:')) return undefined;
  const campos = new Map<string, string>();
  for (const segmento of texto.slice('WIFI:'.length).split(/(?<!\\);/)) {
    const separador = segmento.indexOf(':');
    if (separador < 0) continue;
    campos.set(segmento.slice(0, separador), desescapar(segmento.slice(separador + 1)));
  }
  return {
    ssid: campos.get('S'),
    seguridad: campos.get('T'),
    contrasena: campos.get('P'),
    oculta: (campos.get('H') ?? '').toLowerCase() === 'true'
  };
}

export function clasificarContenido(texto: string): ClasificacionContenido {
  const tipo = detectarTipo(texto);
  const clasificacion: ClasificacionContenido = {
    tipo,
    longitud: texto.length,
    esUrl: tipo === 'url',
    esEmail: tipo === 'email',
    esTelefono: tipo === 'phone',
    esWifi: tipo === 'wifi',
    esSms: tipo === 'sms',
    esVcard: tipo === 'vcard',
    esGeo: tipo === 'geo'
  };
  if (tipo === 'wifi') clasificacion.wifi = parsearWifi(texto);
  return clasificacion;
}
