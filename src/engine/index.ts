/**
 * Engine Layer
 * The sieve and the errors its queries raise
 */

export * from './Sieve';
export * from './errors';
