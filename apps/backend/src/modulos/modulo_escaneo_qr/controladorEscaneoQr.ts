/**
 * Controlador de escaneo QR.
 *
 * Contrato de respuesta:
 * - Imagen ilegible: 400 `IMAGEN_ILEGIBLE`.
 * - Sin simbolos: 422 `QR_NO_ENCONTRADO` con el mensaje de la cascada.
 * - Lote: siempre 200; cada elemento trae su propio `estado`.
 */
import type { Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { conConsulta } from '../../compartido/validaciones/validar';
import { infoDatosQr } from '../modulo_diseno_qr/datosQr';
import type { ResultadoEscaneo, ServicioEscaneoQr } from './servicioEscaneoQr';
import { esquemaConsultaDecodificar } from './validacionesEscaneoQr';

function responderEscaneo(res: Response, resultado: ResultadoEscaneo) {
  if (resultado.estado === 'ilegible') {
    throw new ErrorAplicacion('IMAGEN_ILEGIBLE', resultado.mensajeError ?? 'Imagen ilegible', 400);
  }
  if (resultado.estado === 'sin_simbolo') {
    throw new ErrorAplicacion('QR_NO_ENCONTRADO', resultado.mensajeError ?? 'Sin codigo QR', 422, {
      dimensiones: resultado.dimensiones
    });
  }
  res.json({
    exito: true,
    datos: resultado.simbolos.map((simbolo) => simbolo.texto),
    simbolos: resultado.simbolos,
    intento: resultado.intento,
    dimensiones: resultado.dimensiones,
    duracionMs: resultado.duracionMs
  });
}

export function crearControladorEscaneoQr(servicio: ServicioEscaneoQr) {
  return {
    decodificarArchivo: conConsulta(esquemaConsultaDecodificar, async (req, res, consulta) => {
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        throw new ErrorAplicacion('IMAGEN_REQUERIDA', 'Envia la imagen como cuerpo binario (Content-Type image/*)', 400);
      }
      const incluirRecortes = consulta.recortes === '1' || consulta.recortes === 'true';
      responderEscaneo(res, await servicio.decodificarBytes(req.body, { incluirRecortes }));
    }),

    async decodificarBase64(req: Request, res: Response) {
      const { imagenBase64, incluirRecortes } = req.body;
      const resultado = await servicio.decodificarBase64(imagenBase64, { incluirRecortes });
      if (!resultado.ok) throw ErrorAplicacion.desdeNucleo(resultado.error);
      responderEscaneo(res, resultado.valor);
    },

    async decodificarLote(req: Request, res: Response) {
      const { imagenes, incluirRecortes } = req.body;
      const resultado = await servicio.decodificarLote(imagenes, { incluirRecortes });
      if (!resultado.ok) throw ErrorAplicacion.desdeNucleo(resultado.error);
      const resultados = resultado.valor.map((item, indice) => ({ indice, ...item }));
      res.json({
        total: resultados.length,
        encontrados: resultados.filter((item) => item.estado === 'encontrado').length,
        resultados
      });
    },

    info(req: Request, res: Response) {
      res.json(infoDatosQr(req.body.datos));
    }
  };
}
