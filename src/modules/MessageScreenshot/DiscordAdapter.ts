import { intToRgb, type ColorMode, type RGB } from '../../util/colors'
import { formatTimestamp } from '../../util/functions'
import { tokenizeMentions } from './MentionTokenizer'
import type { MentionLists, MentionResolver, RenderRequest, RoleInfo, UserInfo } from './types'

// The parts of a discord.js Guild / Client the resolver reads
export interface GuildLookup {
    roles: { cache: { get(id: string): { name: string, color: number } | undefined } }
    members: { cache: { get(id: string): { displayName: string } | undefined } }
}
export interface UserLookup {
    users: { cache: { get(id: string): { displayName: string } | undefined } }
}

/**
 * Resolves placeholders from the guild's caches. Users outside the guild fall back to the client's user cache.
 */
export class GuildMentionResolver implements MentionResolver {
    constructor(private guild: GuildLookup | null, private client: UserLookup | null = null) {}

    public resolveRole(id: string): RoleInfo | null {
        const role = this.guild?.roles.cache.get(id)
        if (!role) return null
        return { name: role.name, color: intToRgb(role.color) }
    }

    public resolveUser(id: string): UserInfo | null {
        const member = this.guild?.members.cache.get(id)
        if (member) return { name: member.displayName }
        const user = this.client?.users.cache.get(id)
        return user ? { name: user.displayName } : null
    }
}

/**
 * Color of the member's highest role, `null` when that role is uncolored.
 */
export function getMemberRoleColor(member: { roles: { highest: { color: number } } } | null): RGB | null {
    if (!member) return null
    return intToRgb(member.roles.highest.color)
}

interface Author {
    displayName: string
    displayAvatarURL(options: { extension: 'png', size: 128 }): string
}

// The parts of a discord.js Message a screenshot is built from
export interface RenderableMessage {
    content: string
    createdAt: Date
    author: Author
    member: (Author & { roles: { highest: { color: number } } }) | null
    mentions: {
        roles: { map<T>(fn: (role: { id: string, name: string }) => T): T[] }
        users: { map<T>(fn: (user: { id: string, displayName: string }) => T): T[] }
        members: { get(id: string): { displayName: string } | undefined } | null
    }
    guild: GuildLookup | null
    client: UserLookup
}

export function mentionListsOf(message: RenderableMessage): MentionLists {
    return {
        roles: message.mentions.roles.map(role => ({ id: role.id, name: role.name })),
        users: message.mentions.users.map(user => ({
            id: user.id,
            displayName: message.mentions.members?.get(user.id)?.displayName ?? user.displayName
        }))
    }
}

export function buildRenderRequest(message: RenderableMessage, mode: ColorMode): RenderRequest {
    const author = message.member ?? message.author
    return {
        authorName: author.displayName,
        avatarUrl: author.displayAvatarURL({ extension: 'png', size: 128 }),
        body: tokenizeMentions(message.content, mentionListsOf(message)),
        timestampLabel: formatTimestamp(message.createdAt),
        mode,
        roleColor: getMemberRoleColor(message.member),
        mentionResolver: new GuildMentionResolver(message.guild, message.client)
    }
}
