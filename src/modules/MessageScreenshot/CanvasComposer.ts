import { createCanvas, loadImage, type Canvas, type Image, type SKRSContext2D } from '@napi-rs/canvas'
import { randomUUID } from 'crypto'
import fs from 'fs/promises'
import path from 'path'
import { Logger } from '../../util/logger'
import { toCssColor } from '../../util/colors'
import { errorMessage, fetchUrlBytes } from '../../util/functions'
import { fontFor } from './config'
import { LineWrapper, contextMeasurer } from './LineWrapper'
import { canvasPainter, collectEmojiGraphemes, renderLine } from './TokenRenderer'
import type { EmojiSource, RenderRequest, ScreenshotConfig } from './types'

const logger = new Logger('CanvasComposer')

export type AvatarLoader = (url: string) => Promise<Image | null>

export async function fetchAvatar(url: string): Promise<Image | null> {
    const fetched = await fetchUrlBytes(url)
    if (!fetched.ok) {
        logger.debug(`{fetchAvatar} Skipping avatar: ${fetched.reason}`)
        return null
    }
    try {
        return await loadImage(fetched.data)
    } catch (error) {
        logger.debug(`{fetchAvatar} Skipping undecodable avatar: ${errorMessage(error)}`)
        return null
    }
}

export class CanvasComposer {
    private wrapper: LineWrapper

    constructor(
        private config: ScreenshotConfig,
        private emojiSource: EmojiSource,
        private loadAvatar: AvatarLoader = fetchAvatar
    ) {
        this.wrapper = new LineWrapper(config)
    }

    public async render(request: RenderRequest): Promise<Buffer> {
        const canvas = await this.renderCanvas(request)
        return canvas.encode('png')
    }

    /**
     * Renders and writes `screenshot_<hex>.png` into `dir`. The caller owns (and deletes) the file.
     */
    public async renderToFile(request: RenderRequest, dir: string): Promise<string> {
        const buffer = await this.render(request)
        const file = path.join(dir, `screenshot_${randomUUID().replaceAll('-', '')}.png`)
        await fs.writeFile(file, buffer)
        return file
    }

    public async renderCanvas(request: RenderRequest): Promise<Canvas> {
        const { config } = this
        const palette = config.palettes[request.mode]
        const bodyFont = fontFor(config, config.body)

        // Lay the body out first so the canvas is tall enough for all of it
        const scratch = createCanvas(1, 1).getContext('2d')
        const layout = this.wrapper.wrap(request.body, {
            x: config.body.x,
            y: config.body.y,
            maxWidth: config.body.maxWidth,
            measurer: contextMeasurer(scratch, bodyFont, config.body.size)
        })
        const emojis = await this.emojiSource.preload(collectEmojiGraphemes(layout.lines))
        const avatar = request.avatarUrl ? await this.loadAvatar(request.avatarUrl) : null

        const contentHeight = layout.finalY + config.bottomMargin
        const canvas = createCanvas(config.width, Math.max(config.initialHeight, contentHeight))
        const ctx = canvas.getContext('2d')
        ctx.fillStyle = toCssColor(palette.background)
        ctx.fillRect(0, 0, canvas.width, canvas.height)

        if (avatar) this.drawAvatar(ctx, avatar)

        canvasPainter(ctx, fontFor(config, config.author)).fillText(
            request.authorName,
            config.author.x,
            config.author.y,
            request.roleColor ?? config.authorDefaultColor
        )
        canvasPainter(ctx, fontFor(config, config.timestamp)).fillText(
            request.timestampLabel,
            config.timestamp.x,
            config.timestamp.y,
            config.timestamp.color
        )

        const painter = canvasPainter(ctx, bodyFont)
        for (const line of layout.lines) {
            renderLine(painter, line, {
                size: config.body.size,
                defaultColor: palette.text,
                mentionColor: config.mentionColor,
                specialMentionColor: config.specialMentionColor,
                mentionResolver: request.mentionResolver,
                emojis
            })
        }
        logger.debug(`{renderCanvas} ${layout.lines.length} line(s), ${emojis.size} emoji(s), height ${contentHeight}px`)

        return crop(canvas, contentHeight)
    }

    private drawAvatar(ctx: SKRSContext2D, avatar: Image) {
        const { x, y, size } = this.config.avatar
        ctx.save()
        ctx.beginPath()
        ctx.arc(x + size / 2, y + size / 2, size / 2, 0, Math.PI * 2)
        ctx.closePath()
        ctx.clip()
        ctx.drawImage(avatar, x, y, size, size)
        ctx.restore()
    }
}

function crop(source: Canvas, height: number): Canvas {
    const out = createCanvas(source.width, height)
    const pixels = source.getContext('2d').getImageData(0, 0, source.width, height)
    out.getContext('2d').putImageData(pixels, 0, 0)
    return out
}
