const ZWJ = 0x200d
const VARIATION_SELECTOR_16 = 0xfe0f
const EMOJI_PATTERN = /\p{Extended_Pictographic}|\p{Regional_Indicator}|\u20e3/u

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' })

export function splitGraphemes(text: string): string[] {
    return Array.from(segmenter.segment(text), s => s.segment)
}

export function isEmojiGrapheme(grapheme: string): boolean {
    return EMOJI_PATTERN.test(grapheme)
}

/**
 * Hyphen-joined lowercase hex code points, named the way the twemoji asset set names its files:
 * U+FE0F is dropped unless the sequence is joined with U+200D.
 */
export function codepointKey(grapheme: string): string {
    const points: number[] = []
    for (const char of grapheme) {
        const cp = char.codePointAt(0)
        if (cp !== undefined) points.push(cp)
    }
    const keep = points.includes(ZWJ) ? points : points.filter(cp => cp !== VARIATION_SELECTOR_16)
    return keep.map(cp => cp.toString(16)).join('-')
}
