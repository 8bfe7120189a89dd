/**
 * @asekit/codecs - Aseprite decoding and rendering, PNG export
 */

export * from './ase'
export * from './png'
