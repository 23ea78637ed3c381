import { Logger, yellow } from '../../util/logger'
import { CanvasComposer } from './CanvasComposer'
import { EmojiCache } from './EmojiCache'
import { DEFAULT_SCREENSHOT_CONFIG, registerFonts } from './config'
import type { RenderRequest, ScreenshotConfig } from './types'

const logger = new Logger('MessageScreenshotFactory')

export interface MessageScreenshotOptions {
    fontsDir: string
    emojiCacheDir: string
    emojiBaseUrl?: string
    outputDir: string
    config?: ScreenshotConfig
}

export class MessageScreenshotFactory {
    private static instance: MessageScreenshotFactory | null = null
    private composer: CanvasComposer
    private fontsRegistered = false

    private constructor(private options: MessageScreenshotOptions) {
        const config = options.config ?? DEFAULT_SCREENSHOT_CONFIG
        const emojiCache = new EmojiCache({ cacheDir: options.emojiCacheDir, baseUrl: options.emojiBaseUrl })
        this.composer = new CanvasComposer(config, emojiCache)
    }

    public static getInstance(options?: MessageScreenshotOptions): MessageScreenshotFactory {
        if (!MessageScreenshotFactory.instance) {
            if (!options) throw new Error('MessageScreenshotFactory needs options on first use')
            MessageScreenshotFactory.instance = new MessageScreenshotFactory(options)
        }
        return MessageScreenshotFactory.instance
    }

    public init() {
        if (this.fontsRegistered) return
        registerFonts(this.options.config ?? DEFAULT_SCREENSHOT_CONFIG, this.options.fontsDir)
        this.fontsRegistered = true
    }

    /**
     * Renders the request to a temporary PNG and returns its path.
     */
    public async createScreenshot(request: RenderRequest): Promise<string> {
        const start = performance.now()
        const file = await this.composer.renderToFile(request, this.options.outputDir)
        logger.info(`{createScreenshot} Rendered ${yellow(file)} in ${(performance.now() - start).toFixed(2)}ms`)
        return file
    }
}
