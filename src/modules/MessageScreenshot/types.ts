import type { Image } from '@napi-rs/canvas'
import type { ColorMode, Palette, RGB } from '../../util/colors'

export type FontStyle = 'regular' | 'bold' | 'italic'

export interface FontSpec {
    style: FontStyle
    size: number
}

export interface TextBlockConfig extends FontSpec {
    x: number
    y: number
}

export interface ScreenshotConfig {
    width: number
    initialHeight: number
    bottomMargin: number
    lineLeading: number
    avatar: {
        x: number
        y: number
        size: number
    }
    author: TextBlockConfig
    timestamp: TextBlockConfig & { color: RGB }
    body: TextBlockConfig & { maxWidth: number }
    authorDefaultColor: RGB
    fonts: Readonly<Record<FontStyle, { family: string, file: string }>>
    palettes: Readonly<Record<ColorMode, Palette>>
    mentionColor: RGB
    specialMentionColor: RGB
}

export interface RoleInfo {
    name: string
    // null when the role has Discord's default (uncolored) color
    color: RGB | null
}

export interface UserInfo {
    name: string
}

/**
 * Looks up the guild entities placeholders refer to. A `null` return means "not found".
 */
export interface MentionResolver {
    resolveRole(id: string): RoleInfo | null
    resolveUser(id: string): UserInfo | null
}

export type PlaceholderToken =
    | { kind: 'role', id: string, name: string, raw: string }
    | { kind: 'user', id: string, name: string, raw: string }
    | { kind: 'everyone', raw: string }
    | { kind: 'here', raw: string }
    | { kind: 'invalid', raw: string }

export type TextSegment =
    | { kind: 'text', text: string }
    | { kind: 'mention', token: PlaceholderToken }

export type Run =
    | { kind: 'text', text: string, width: number }
    | { kind: 'mention', token: PlaceholderToken, width: number }

export interface LayoutLine {
    text: string
    runs: Run[]
    x: number
    y: number
    width: number
}

export interface WrapResult {
    lines: LayoutLine[]
    finalY: number
}

export interface TextMeasurer {
    readonly size: number
    measure(text: string): number
}

export interface RenderRequest {
    readonly authorName: string
    readonly avatarUrl: string | null
    // body with mentions already rewritten into placeholders
    readonly body: string
    readonly timestampLabel: string
    readonly mode: ColorMode
    readonly roleColor: RGB | null
    readonly mentionResolver: MentionResolver
}

export interface EmojiSource {
    preload(graphemes: Iterable<string>): Promise<Map<string, Image | null>>
}

export interface MentionLists {
    roles: Array<{ id: string, name: string }>
    users: Array<{ id: string, displayName: string }>
}
