/**
 * Controlador del diseñador de QR.
 *
 * Contrato de respuesta:
 * - JSON `{ exito, imagenBase64, formato, ancho, alto, metadatos, advertencias }`
 *   salvo `formato: 'png'` (o la ruta `/png`), que responde `image/png`.
 * - Datos vacios/largos, logo o fondo corruptos: 400. Datos que no caben en
 *   el nivel de correccion pedido: 422.
 */
import type { Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { conConsulta } from '../../compartido/validaciones/validar';
import { exito, fallo, type Resultado } from '../../compartido/tipos/resultado';
import { bytesDesdeBase64 } from '../modulo_escaneo_qr/lectorImagen';
import { renderizarQr } from './motorRenderQr';
import {
  PLANTILLAS_DISENO,
  aplicarPlantilla,
  esNombrePlantilla,
  obtenerEstilosDisponibles
} from './plantillasDiseno';
import type { ImagenRenderizada } from './tiposDiseno';
import { validarOpcionesDiseno, type AdvertenciaEstilo, type OpcionesDisenoCrudas } from './validadorEstiloQr';
import { esquemaConsultaPng, type CuerpoDisenoQr } from './validacionesDisenoQr';

function adjunto(valor: string | undefined, mensaje: string): Resultado<Buffer | undefined> {
  if (valor === undefined) return exito(undefined);
  const bytes = bytesDesdeBase64(valor);
  return bytes.ok ? bytes : fallo('ENTRADA_INVALIDA', mensaje);
}

function aOpcionesCrudas(cuerpo: CuerpoDisenoQr): OpcionesDisenoCrudas {
  const logo = adjunto(cuerpo.logoBase64, 'El logo no es base64 valido');
  if (!logo.ok) throw ErrorAplicacion.desdeNucleo(logo.error);
  const fondo = adjunto(cuerpo.fondoBase64, 'La imagen de fondo no es base64 valida');
  if (!fondo.ok) throw ErrorAplicacion.desdeNucleo(fondo.error);

  return {
    datos: cuerpo.datos,
    tamano: cuerpo.tamano,
    borde: cuerpo.borde,
    correccionErrores: cuerpo.correccionErrores,
    colorRelleno: cuerpo.colorRelleno,
    colorFondo: cuerpo.colorFondo,
    dibujanteModulo: cuerpo.dibujanteModulo,
    mascaraColor: cuerpo.mascaraColor,
    radioEsquina: cuerpo.radioEsquina,
    logo: logo.valor,
    tamanoLogo: cuerpo.tamanoLogo,
    posicionLogo: cuerpo.posicionLogo,
    fondo: fondo.valor,
    estilo: cuerpo.estilo
  };
}

async function renderizar(opciones: OpcionesDisenoCrudas) {
  const validada = validarOpcionesDiseno(opciones);
  if (!validada.ok) throw ErrorAplicacion.desdeNucleo(validada.error);
  const imagen = await renderizarQr(validada.valor.solicitud);
  if (!imagen.ok) throw ErrorAplicacion.desdeNucleo(imagen.error);
  return { imagen: imagen.valor, advertencias: validada.valor.advertencias };
}

function enviarPng(res: Response, imagen: ImagenRenderizada) {
  res.setHeader('Content-Type', 'image/png');
  res.setHeader('Cache-Control', 'no-store');
  res.send(imagen.png);
}

function cuerpoImagen(imagen: ImagenRenderizada, advertencias: AdvertenciaEstilo[]) {
  return {
    exito: true,
    imagenBase64: imagen.png.toString('base64'),
    formato: imagen.formato,
    ancho: imagen.ancho,
    alto: imagen.alto,
    metadatos: imagen.metadatos,
    advertencias
  };
}

export function crearControladorDisenoQr() {
  return {
    async disenar(req: Request, res: Response) {
      const cuerpo: CuerpoDisenoQr = req.body;
      const { imagen, advertencias } = await renderizar(aOpcionesCrudas(cuerpo));
      if (cuerpo.formato === 'png') {
        enviarPng(res, imagen);
        return;
      }
      res.json(cuerpoImagen(imagen, advertencias));
    },

    async vistaPrevia(req: Request, res: Response) {
      const cuerpo: CuerpoDisenoQr & { plantilla: string } = req.body;
      if (!esNombrePlantilla(cuerpo.plantilla)) {
        throw new ErrorAplicacion('PLANTILLA_NO_ENCONTRADA', `Plantilla '${cuerpo.plantilla}' no encontrada`, 400, {
          disponibles: Object.keys(PLANTILLAS_DISENO)
        });
      }
      const plantilla = PLANTILLAS_DISENO[cuerpo.plantilla];
      const { imagen, advertencias } = await renderizar(aplicarPlantilla(cuerpo.plantilla, aOpcionesCrudas(cuerpo)));
      if (cuerpo.formato === 'png') {
        enviarPng(res, imagen);
        return;
      }
      res.json({
        ...cuerpoImagen(imagen, advertencias),
        plantilla: cuerpo.plantilla,
        nombrePlantilla: plantilla.nombre,
        descripcionPlantilla: plantilla.descripcion
      });
    },

    png: conConsulta(esquemaConsultaPng, async (_req, res, consulta) => {
      const { imagen } = await renderizar({
        datos: consulta.datos,
        tamano: consulta.tamano,
        correccionErrores: consulta.correccionErrores
      });
      enviarPng(res, imagen);
    }),

    estilos(_req: Request, res: Response) {
      res.json(obtenerEstilosDisponibles());
    },

    plantillas(_req: Request, res: Response) {
      res.json({ plantillas: PLANTILLAS_DISENO });
    }
  };
}
