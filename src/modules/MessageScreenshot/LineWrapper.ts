import type { SKRSContext2D } from '@napi-rs/canvas'
import { isEmojiGrapheme, splitGraphemes } from './graphemes'
import { PLACEHOLDER_PATTERN, containsPlaceholder, isPlaceholder, parsePlaceholders } from './MentionTokenizer'
import type { LayoutLine, Run, ScreenshotConfig, TextMeasurer, WrapResult } from './types'

export interface WrapOptions {
    x: number
    y: number
    maxWidth: number
    measurer: TextMeasurer
}

/**
 * Measures with the context's current state after switching to `font`.
 */
export function contextMeasurer(ctx: SKRSContext2D, font: string, size: number): TextMeasurer {
    return {
        size,
        measure(text) {
            ctx.font = font
            return ctx.measureText(text).width
        }
    }
}

/**
 * Counts every emoji grapheme as one `size`-wide square, the way the renderer draws its bitmap.
 */
export function emojiAwareMeasurer(measurer: TextMeasurer): TextMeasurer {
    return {
        size: measurer.size,
        measure(text) {
            let width = 0
            let pending = ''
            for (const grapheme of splitGraphemes(text)) {
                if (!isEmojiGrapheme(grapheme)) {
                    pending += grapheme
                    continue
                }
                if (pending) width += measurer.measure(pending)
                pending = ''
                width += measurer.size
            }
            if (pending) width += measurer.measure(pending)
            return width
        }
    }
}

/**
 * Space-separated words, except that spaces inside a placeholder do not separate anything.
 */
export function splitWords(line: string): string[] {
    const words: string[] = []
    let current = ''
    for (const part of line.split(PLACEHOLDER_PATTERN)) {
        if (!part) continue
        if (isPlaceholder(part)) {
            current += part
            continue
        }
        const pieces = part.split(' ')
        current += pieces[0]
        for (const piece of pieces.slice(1)) {
            words.push(current)
            current = piece
        }
    }
    words.push(current)
    return words.filter(word => word.length > 0)
}

/**
 * Cuts a word into the longest grapheme runs that fit `maxWidth`. Every run holds at least one grapheme.
 */
export function breakWord(word: string, maxWidth: number, measurer: TextMeasurer): string[] {
    const chunks: string[] = []
    let chunk = ''
    for (const grapheme of splitGraphemes(word)) {
        if (chunk && measurer.measure(chunk + grapheme) > maxWidth) {
            chunks.push(chunk)
            chunk = grapheme
        } else {
            chunk += grapheme
        }
    }
    if (chunk) chunks.push(chunk)
    return chunks
}

/**
 * Greedy word wrapping over placeholder-annotated text.
 */
export class LineWrapper {
    constructor(private config: Pick<ScreenshotConfig, 'lineLeading'>) {}

    public lineHeight(measurer: TextMeasurer): number {
        return measurer.size + this.config.lineLeading
    }

    public wrap(text: string, { x, y, maxWidth, measurer: glyphMeasurer }: WrapOptions): WrapResult {
        const lines: LayoutLine[] = []
        if (!text) return { lines, finalY: y }

        const measurer = emojiAwareMeasurer(glyphMeasurer)

        const lineHeight = this.lineHeight(measurer)
        let cursorY = y
        const flush = (content: string) => {
            lines.push(this.layoutLine(content, x, cursorY, measurer))
            cursorY += lineHeight
        }

        for (const explicitLine of text.split('\n')) {
            const words = splitWords(explicitLine)
            if (words.length === 0) {
                flush('')
                continue
            }

            let current = ''
            for (const word of words) {
                // placeholders are atomic: an over-wide word holding one overflows instead of splitting
                if (!containsPlaceholder(word) && measurer.measure(word) > maxWidth) {
                    if (current) flush(current)
                    const chunks = breakWord(word, maxWidth, measurer)
                    for (const chunk of chunks.slice(0, -1)) flush(chunk)
                    current = chunks[chunks.length - 1] ?? ''
                    continue
                }
                if (!current) {
                    current = word
                    continue
                }
                const tentative = `${current} ${word}`
                if (measurer.measure(tentative) <= maxWidth) {
                    current = tentative
                } else {
                    flush(current)
                    current = word
                }
            }
            if (current) flush(current)
        }

        return { lines, finalY: cursorY }
    }

    private layoutLine(text: string, x: number, y: number, measurer: TextMeasurer): LayoutLine {
        const runs = parsePlaceholders(text).map((segment): Run => segment.kind === 'text'
            ? { kind: 'text', text: segment.text, width: measurer.measure(segment.text) }
            : { kind: 'mention', token: segment.token, width: measurer.measure(segment.token.raw) }
        )
        return { text, runs, x, y, width: measurer.measure(text) }
    }
}
