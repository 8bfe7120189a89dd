/**
 * @asekit/composite - Color model and layer blend modes
 * Pure TypeScript, zero dependencies
 */

export * from './types'
export * from './color'
export * from './blend'
