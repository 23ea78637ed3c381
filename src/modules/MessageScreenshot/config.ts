import { GlobalFonts } from '@napi-rs/canvas'
import fs from 'fs'
import path from 'path'
import { Logger, yellow } from '../../util/logger'
import { MENTION_COLOR, PALETTES, SPECIAL_MENTION_COLOR, TIMESTAMP_COLOR, WHITE } from '../../util/colors'
import { MAX_CHARS, WORD_LIMIT } from '../../util/constants'
import type { FontSpec, FontStyle, ScreenshotConfig } from './types'

const logger = new Logger('MessageScreenshot | config')

const FONT_STYLES: readonly FontStyle[] = ['regular', 'bold', 'italic']

export const DEFAULT_SCREENSHOT_CONFIG: Readonly<ScreenshotConfig> = {
    width: 800,
    initialHeight: 400,
    bottomMargin: 20,
    lineLeading: 6,
    avatar: { x: 20, y: 20, size: 64 },
    author: { x: 100, y: 20, size: 24, style: 'bold' },
    timestamp: { x: 100, y: 50, size: 18, style: 'regular', color: TIMESTAMP_COLOR },
    body: { x: 100, y: 90, size: 22, style: 'regular', maxWidth: 680 },
    authorDefaultColor: WHITE,
    fonts: {
        regular: { family: 'Whitney Book', file: 'whitneybook.otf' },
        bold: { family: 'Whitney Semibold', file: 'whitneysemibold.otf' },
        italic: { family: 'Whitney Book Italic', file: 'whitneybookitalic.otf' }
    },
    palettes: PALETTES,
    mentionColor: MENTION_COLOR,
    specialMentionColor: SPECIAL_MENTION_COLOR
}

/**
 * CSS font shorthand; `sans-serif` takes over when the family was never registered.
 */
export function fontFor(config: ScreenshotConfig, { style, size }: FontSpec): string {
    return `${size}px "${config.fonts[style].family}", sans-serif`
}

/**
 * Registers every configured font file found in `fontsDir`. Returns the styles that loaded.
 */
export function registerFonts(config: ScreenshotConfig, fontsDir: string): FontStyle[] {
    const loaded: FontStyle[] = []
    for (const style of FONT_STYLES) {
        const font = config.fonts[style]
        const file = path.join(fontsDir, font.file)
        if (!fs.existsSync(file)) {
            logger.warn(`{registerFonts} ${yellow(file)} not found, ${style} text falls back to sans-serif`)
            continue
        }
        if (GlobalFonts.registerFromPath(file, font.family)) {
            loaded.push(style)
        } else {
            logger.warn(`{registerFonts} Could not load ${yellow(file)}, ${style} text falls back to sans-serif`)
        }
    }
    logger.info(`{registerFonts} Loaded fonts: ${loaded.join(', ') || 'none'}`)
    return loaded
}

export type LengthCheck =
    | { ok: true }
    | { ok: false, reason: 'words' | 'chars', limit: number }

/**
 * Word count and character cap a message must satisfy before it is rendered. Characters are code points.
 */
export function checkMessageLength(content: string): LengthCheck {
    const words = content.split(/\s+/).filter(Boolean).length
    if (words > WORD_LIMIT) return { ok: false, reason: 'words', limit: WORD_LIMIT }
    if ([...content].length > MAX_CHARS) return { ok: false, reason: 'chars', limit: MAX_CHARS }
    return { ok: true }
}
