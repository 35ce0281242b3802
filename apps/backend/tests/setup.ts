/**
 * setup
 *
 * Responsabilidad: Entorno comun de las pruebas del backend.
 */
process.env.NODE_ENV = 'test';

// Las pruebas nunca deben tocar un Redis real.
process.env.REDIS_URL = '';
