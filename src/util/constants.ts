// Messages longer than this are refused before rendering
export const WORD_LIMIT = 200 as const
export const MAX_CHARS = 2000 as const

export const FETCH_TIMEOUT_MS = 8000 as const

export const TRANSIENT_NOTICE_MS = 5000 as const
export const SETUP_CONFIRMATION_MS = 2000 as const

export const DEFAULT_EMOJI_BASE_URL = 'https://cdn.jsdelivr.net/gh/twitter/twemoji@latest/assets/72x72' as const
