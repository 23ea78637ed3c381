export type RGB = readonly [r: number, g: number, b: number]

export type ColorMode = 'light' | 'dark'

export interface Palette {
    background: RGB
    text: RGB
}

export const PALETTES: Readonly<Record<ColorMode, Palette>> = {
    dark: { background: [54, 57, 63], text: [220, 221, 222] },
    light: { background: [255, 255, 255], text: [0, 0, 0] }
}

// Discord's blurple, used for user mentions and uncolored role mentions
export const MENTION_COLOR: RGB = [88, 101, 242]
// @everyone / @here highlight
export const SPECIAL_MENTION_COLOR: RGB = [250, 166, 26]
export const TIMESTAMP_COLOR: RGB = [150, 150, 150]
export const WHITE: RGB = [255, 255, 255]

export const toCssColor = ([r, g, b]: RGB) => `rgb(${r}, ${g}, ${b})`

/**
 * Unpacks a Discord integer color (`0xRRGGBB`). `0` is Discord's "no color" and maps to `null`.
 */
export function intToRgb(value: number): RGB | null {
    if (!value) return null
    return [(value >> 16) & 255, (value >> 8) & 255, value & 255]
}

export const isColorMode = (value: unknown): value is ColorMode => value === 'light' || value === 'dark'
