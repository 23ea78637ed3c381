import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import GuildConfigManager from '.'

let dir: string
let file: string
const manager = GuildConfigManager.getInstance()

beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'guild-config-'))
    file = path.join(dir, 'config.json')
    manager.setFilePath(file)
})

afterEach(async () => {
    manager.removeAllListeners()
    await fs.rm(dir, { recursive: true, force: true })
})

describe('GuildConfigManager', () => {
    it('defaults to light mode when there is no file', async () => {
        expect(await manager.getAll()).toEqual({})
        expect(await manager.getConfig('123')).toEqual({ mode: 'light' })
    })

    it('defaults to light mode without a guild', async () => {
        await fs.writeFile(file, JSON.stringify({ '123': { mode: 'dark' } }))
        expect(await manager.getConfig(null)).toEqual({ mode: 'light' })
    })

    it('normalizes legacy and invalid entries', async () => {
        await fs.writeFile(file, JSON.stringify({
            '1': 'dark',
            '2': { mode: 'dark' },
            '3': 'purple',
            '4': { mode: 5 },
            '5': 42
        }))
        expect(await manager.getAll()).toEqual({
            '1': { mode: 'dark' },
            '2': { mode: 'dark' },
            '3': { mode: 'light' },
            '4': { mode: 'light' }
        })
        expect(await manager.getConfig('5')).toEqual({ mode: 'light' })
    })

    it('reads unparseable files as empty', async () => {
        await fs.writeFile(file, '{ not json')
        expect(await manager.getAll()).toEqual({})

        await fs.writeFile(file, '["dark"]')
        expect(await manager.getAll()).toEqual({})
    })

    it('writes pretty-printed json and keeps other guilds as they were', async () => {
        await fs.writeFile(file, JSON.stringify({ '1': 'dark', '5': 42, '6': { mode: 'sepia', note: 'kept' } }))
        await manager.setConfig('9', { mode: 'dark' })

        expect(await fs.readFile(file, 'utf-8')).toBe(JSON.stringify({
            '1': 'dark',
            '5': 42,
            '6': { mode: 'sepia', note: 'kept' },
            '9': { mode: 'dark' }
        }, null, 2))
        expect(await manager.getConfig('9')).toEqual({ mode: 'dark' })
        expect(await manager.getConfig('1')).toEqual({ mode: 'dark' })
    })

    it('replaces an unreadable file', async () => {
        await fs.writeFile(file, '{ not json')
        await manager.setConfig('3', { mode: 'dark' })
        expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({ '3': { mode: 'dark' } })
    })

    it('creates the file and announces the update', async () => {
        const onUpdate = vi.fn()
        manager.on('configUpdate', onUpdate)

        await manager.setConfig('7', { mode: 'light' })

        expect(onUpdate).toHaveBeenCalledWith('7', { mode: 'light' })
        expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({ '7': { mode: 'light' } })
    })
})
