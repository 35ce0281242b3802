/**
 * Punto de entrada del API de QR.
 * Inicializa configuracion, almacen de limites y servidor HTTP.
 */
import { crearApp } from './app';
import { configuracion } from './configuracion';
import { crearAlmacenContadores } from './infraestructura/redis/clienteRedis';
import { logError, log } from './infraestructura/logging/logger';
import { LimitadorTasa } from './modulos/modulo_limite_tasa/limitadorTasa';

async function iniciar() {
  const almacen = await crearAlmacenContadores();
  const limitador = new LimitadorTasa(almacen, { prefijo: configuracion.rateLimitPrefijo });

  const app = crearApp({ limitador });
  app.listen(configuracion.puerto, () => {
    log('ok', 'API de QR escuchando', {
      puerto: configuracion.puerto,
      almacenLimites: almacen.tipo,
      motores: configuracion.qrMotores
    });
  });
}

iniciar().catch((error) => {
  logError('Error al iniciar el servidor', error);
  process.exit(1);
});
