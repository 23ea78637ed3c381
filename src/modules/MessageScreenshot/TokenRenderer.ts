import type { Image, SKRSContext2D } from '@napi-rs/canvas'
import { toCssColor, type RGB } from '../../util/colors'
import { isEmojiGrapheme, splitGraphemes } from './graphemes'
import type { LayoutLine, MentionResolver, PlaceholderToken } from './types'

/**
 * The drawing operations a line needs. Positions are top-left anchored.
 */
export interface GlyphPainter {
    measure(text: string): number
    fillText(text: string, x: number, y: number, color: RGB): void
    drawImage(image: Image, x: number, y: number, size: number): void
}

export function canvasPainter(ctx: SKRSContext2D, font: string): GlyphPainter {
    return {
        measure(text) {
            ctx.font = font
            return ctx.measureText(text).width
        },
        fillText(text, x, y, color) {
            ctx.font = font
            ctx.textBaseline = 'top'
            ctx.fillStyle = toCssColor(color)
            ctx.fillText(text, x, y)
        },
        drawImage(image, x, y, size) {
            ctx.drawImage(image, x, y, size, size)
        }
    }
}

export interface LineStyle {
    size: number
    defaultColor: RGB
    mentionColor: RGB
    specialMentionColor: RGB
    mentionResolver: MentionResolver
    // bitmaps resolved ahead of drawing; a missing or null entry draws the glyph instead
    emojis: ReadonlyMap<string, Image | null>
}

interface Label {
    text: string
    color: RGB
}

export function mentionLabel(token: PlaceholderToken, style: LineStyle): Label {
    switch (token.kind) {
        case 'role': {
            const role = style.mentionResolver.resolveRole(token.id)
            return { text: `@${role?.name ?? token.name}`, color: role?.color ?? style.mentionColor }
        }
        case 'user': {
            const user = style.mentionResolver.resolveUser(token.id)
            return { text: `@${user?.name ?? token.name}`, color: style.mentionColor }
        }
        case 'everyone':
            return { text: '@everyone', color: style.specialMentionColor }
        case 'here':
            return { text: '@here', color: style.specialMentionColor }
        case 'invalid':
            return { text: token.raw, color: style.defaultColor }
    }
}

/**
 * Draws one wrapped line left to right and returns the final pen position.
 */
export function renderLine(painter: GlyphPainter, line: LayoutLine, style: LineStyle): number {
    let penX = line.x
    for (const run of line.runs) {
        if (run.kind === 'mention') {
            const label = mentionLabel(run.token, style)
            painter.fillText(label.text, penX, line.y, label.color)
            penX += painter.measure(label.text)
            continue
        }
        for (const grapheme of splitGraphemes(run.text)) {
            const bitmap = isEmojiGrapheme(grapheme) ? style.emojis.get(grapheme) : null
            if (bitmap) {
                painter.drawImage(bitmap, penX, line.y, style.size)
                penX += style.size
                continue
            }
            painter.fillText(grapheme, penX, line.y, style.defaultColor)
            penX += painter.measure(grapheme)
        }
    }
    return penX
}

export function collectEmojiGraphemes(lines: LayoutLine[]): Set<string> {
    const found = new Set<string>()
    for (const line of lines) {
        for (const run of line.runs) {
            if (run.kind !== 'text') continue
            for (const grapheme of splitGraphemes(run.text)) {
                if (isEmojiGrapheme(grapheme)) found.add(grapheme)
            }
        }
    }
    return found
}
