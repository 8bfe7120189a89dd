/**
 * Aseprite (.ase / .aseprite) codec
 *
 * Features:
 * - Indexed (8 bpp) and RGBA (32 bpp) sprites
 * - Legacy and modern palette chunks
 * - Raw and zlib-compressed cels
 * - Frame compositing with layer opacity and blend modes
 * - Encoding (for round trips and generated sprites)
 *
 * Linked cels are recorded but not resolved. Grayscale (16 bpp) files
 * parse but do not render.
 */

export * from './types'
export * from './cursor'
export * from './writer'
export * from './inflate'
export * from './palette'
export * from './layer'
export * from './cel'
export * from './chunk'
export * from './decoder'
export * from './render'
export * from './encoder'
export * from './codec'
