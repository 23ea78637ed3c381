import { describe, it, expect } from 'vitest'
import { GuildMentionResolver, buildRenderRequest, getMemberRoleColor, type GuildLookup, type RenderableMessage, type UserLookup } from './DiscordAdapter'

const cache = <T>(entries: Record<string, T>) => ({ cache: new Map(Object.entries(entries)) })

const guild: GuildLookup = {
    roles: cache({
        '10': { name: 'Moderators', color: 0xff8800 },
        '11': { name: 'Members', color: 0 }
    }),
    members: cache({ '20': { displayName: 'Ann (server nick)' } })
}
const client: UserLookup = { users: cache({ '20': { displayName: 'Ann' }, '30': { displayName: 'Bo' } }) }

describe('GuildMentionResolver', () => {
    const resolver = new GuildMentionResolver(guild, client)

    it('resolves roles with their color', () => {
        expect(resolver.resolveRole('10')).toEqual({ name: 'Moderators', color: [255, 136, 0] })
    })

    it('treats the default role color as no color', () => {
        expect(resolver.resolveRole('11')).toEqual({ name: 'Members', color: null })
    })

    it('returns null for unknown roles', () => {
        expect(resolver.resolveRole('99')).toBeNull()
    })

    it('prefers the member display name over the user cache', () => {
        expect(resolver.resolveUser('20')).toEqual({ name: 'Ann (server nick)' })
        expect(resolver.resolveUser('30')).toEqual({ name: 'Bo' })
        expect(resolver.resolveUser('40')).toBeNull()
    })

    it('resolves nothing without a guild', () => {
        const outside = new GuildMentionResolver(null)
        expect(outside.resolveRole('10')).toBeNull()
        expect(outside.resolveUser('20')).toBeNull()
    })
})

describe('getMemberRoleColor', () => {
    it('uses the highest role color', () => {
        expect(getMemberRoleColor({ roles: { highest: { color: 0x5865f2 } } })).toEqual([88, 101, 242])
    })

    it('returns null for uncolored roles and missing members', () => {
        expect(getMemberRoleColor({ roles: { highest: { color: 0 } } })).toBeNull()
        expect(getMemberRoleColor(null)).toBeNull()
    })
})

describe('buildRenderRequest', () => {
    const avatar = (name: string) => ({ extension, size }: { extension: string, size: number }) => `https://cdn.test/${name}.${extension}?size=${size}`

    const message = (member: RenderableMessage['member']): RenderableMessage => ({
        content: 'hey <@!20> and <@&10>, also @here',
        createdAt: new Date(Date.UTC(2024, 5, 1, 16, 5)),
        author: { displayName: 'ann_user', displayAvatarURL: avatar('user') },
        member,
        mentions: {
            roles: [{ id: '10', name: 'Moderators' }],
            users: [{ id: '20', displayName: 'Ann' }],
            members: new Map([['20', { displayName: 'Ann (server nick)' }]])
        },
        guild,
        client
    })

    it('tokenizes the content and takes name, avatar and color from the member', () => {
        const request = buildRenderRequest(message({
            displayName: 'Ann (server nick)',
            displayAvatarURL: avatar('member'),
            roles: { highest: { color: 0xff8800 } }
        }), 'dark')

        expect(request).toMatchObject({
            authorName: 'Ann (server nick)',
            avatarUrl: 'https://cdn.test/member.png?size=128',
            body: 'hey {{USER:20:Ann (server nick)}} and {{ROLE:10:Moderators}}, also {{HERE}}',
            timestampLabel: '4:05 PM',
            mode: 'dark',
            roleColor: [255, 136, 0]
        })
        expect(request.mentionResolver.resolveRole('10')).toEqual({ name: 'Moderators', color: [255, 136, 0] })
    })

    it('falls back to the author outside a guild', () => {
        const request = buildRenderRequest(message(null), 'light')

        expect(request.authorName).toBe('ann_user')
        expect(request.avatarUrl).toBe('https://cdn.test/user.png?size=128')
        expect(request.roleColor).toBeNull()
    })
})
