import type { MentionLists, PlaceholderToken, TextSegment } from './types'

// Non-greedy so that adjacent placeholders stay separate
export const PLACEHOLDER_PATTERN = /(\{\{.*?\}\})/

/**
 * Rewrites Discord mention markup into `{{KIND:id:name}}` placeholders.
 * Everything else in the text is left untouched.
 */
export function tokenizeMentions(content: string, mentions: MentionLists): string {
    let out = content
    for (const role of mentions.roles) {
        out = out.replaceAll(`<@&${role.id}>`, `{{ROLE:${role.id}:${role.name}}}`)
    }
    for (const user of mentions.users) {
        const replacement = `{{USER:${user.id}:${user.displayName}}}`
        out = out
            .replaceAll(`<@!${user.id}>`, replacement)
            .replaceAll(`<@${user.id}>`, replacement)
    }
    return out
        .replaceAll('@everyone', '{{EVERYONE}}')
        .replaceAll('@here', '{{HERE}}')
}

export function parseToken(raw: string): PlaceholderToken {
    const inner = raw.slice(2, -2)
    if (inner === 'EVERYONE') return { kind: 'everyone', raw }
    if (inner === 'HERE') return { kind: 'here', raw }

    const match = /^(ROLE|USER):(\d+):(.*)$/s.exec(inner)
    if (!match) return { kind: 'invalid', raw }
    const [, kind, id, name] = match
    return kind === 'ROLE'
        ? { kind: 'role', id, name, raw }
        : { kind: 'user', id, name, raw }
}

export const isPlaceholder = (part: string) => part.startsWith('{{') && part.endsWith('}}') && part.length >= 4

/**
 * Splits text on placeholder boundaries, keeping the plain text between them.
 */
export function parsePlaceholders(text: string): TextSegment[] {
    const segments: TextSegment[] = []
    for (const part of text.split(PLACEHOLDER_PATTERN)) {
        if (!part) continue
        if (isPlaceholder(part)) segments.push({ kind: 'mention', token: parseToken(part) })
        else segments.push({ kind: 'text', text: part })
    }
    return segments
}

export function containsPlaceholder(text: string): boolean {
    return PLACEHOLDER_PATTERN.test(text)
}
