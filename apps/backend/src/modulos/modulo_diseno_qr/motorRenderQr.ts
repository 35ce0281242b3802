/**
 * Motor de render de QR con estilo.
 *
 * Pasos: matriz -> pintado (dibujante + mascara, 10 px/modulo) -> escala Lanczos
 * a `tamano` -> logo -> fondo -> decoraciones -> PNG.
 *
 * No lanza por entradas del usuario: capacidad excedida y logo/fondo corruptos
 * vuelven como `Resultado` fallido. Cualquier otra falla de sharp se reporta
 * como `RENDER_FALLIDO`.
 */
import sharp from 'sharp';
import { log } from '../../infraestructura/logging/logger';
import { registrarRender } from '../../compartido/observabilidad/metrics';
import { exito, fallo, type Resultado, type TipoErrorNucleo } from '../../compartido/tipos/resultado';
import { aplicarDecoraciones, aplicarFondo, pegarLogo } from './decoraciones';
import { construirMatriz } from './matrizQr';
import { pintarMatriz } from './pintorModulos';
import type { ImagenRenderizada, SolicitudRenderQr } from './tiposDiseno';

const PROPORCION_LOGO_POR_DEFECTO = 0.2;

const RESULTADO_METRICA: Record<TipoErrorNucleo, 'entrada_invalida' | 'capacidad_excedida' | 'render_fallido'> = {
  ENTRADA_INVALIDA: 'entrada_invalida',
  CAPACIDAD_EXCEDIDA: 'capacidad_excedida',
  RENDER_FALLIDO: 'render_fallido'
};

function fallar<T>(tipo: TipoErrorNucleo, mensaje: string): Resultado<T> {
  registrarRender(RESULTADO_METRICA[tipo]);
  return fallo(tipo, mensaje);
}

async function componer(solicitud: SolicitudRenderQr): Promise<Resultado<ImagenRenderizada>> {
  const matriz = construirMatriz(solicitud.datos, solicitud.correccionErrores);
  if (!matriz.ok) return fallar(matriz.error.tipo, matriz.error.mensaje);

  const raster = pintarMatriz(matriz.valor, solicitud);
  let png = await sharp(Buffer.from(raster.datos.buffer, raster.datos.byteOffset, raster.datos.byteLength), {
    raw: { width: raster.lado, height: raster.lado, channels: 4 }
  })
    .resize(solicitud.tamano, solicitud.tamano, { kernel: 'lanczos3' })
    .png()
    .toBuffer();
  const dimensiones = { ancho: solicitud.tamano, alto: solicitud.tamano };

  if (solicitud.logo) {
    const lado = solicitud.logo.tamanoPx ?? Math.trunc(solicitud.tamano * PROPORCION_LOGO_POR_DEFECTO);
    const conLogo = await pegarLogo(png, dimensiones, solicitud.logo.imagen, lado, solicitud.logo.posicion);
    if (!conLogo.ok) return fallar(conLogo.error.tipo, conLogo.error.mensaje);
    png = conLogo.valor;
  }

  if (solicitud.fondo) {
    const conFondo = await aplicarFondo(png, dimensiones, solicitud.fondo);
    if (!conFondo.ok) return fallar(conFondo.error.tipo, conFondo.error.mensaje);
    png = conFondo.valor;
  }

  if (solicitud.decoraciones) {
    png = await aplicarDecoraciones(png, solicitud.decoraciones);
  }

  const meta = await sharp(png).metadata();
  registrarRender('ok');
  return exito({
    png,
    ancho: meta.width ?? solicitud.tamano,
    alto: meta.height ?? solicitud.tamano,
    formato: 'PNG',
    metadatos: {
      datos: solicitud.datos,
      correccionErrores: solicitud.correccionErrores,
      dibujanteModulo: solicitud.dibujanteModulo,
      mascaraColor: solicitud.mascaraColor,
      tieneLogo: Boolean(solicitud.logo),
      tieneFondo: Boolean(solicitud.fondo),
      decoraciones: Boolean(solicitud.decoraciones),
      version: matriz.valor.version,
      modulos: matriz.valor.tamano
    }
  });
}

export async function renderizarQr(solicitud: SolicitudRenderQr): Promise<Resultado<ImagenRenderizada>> {
  try {
    return await componer(solicitud);
  } catch (error) {
    log('warn', 'Fallo inesperado al renderizar QR', {
      motivo: error instanceof Error ? error.message : String(error),
      tamano: solicitud.tamano
    });
    return fallar('RENDER_FALLIDO', 'No se pudo generar la imagen del QR');
  }
}
