import { EventEmitter } from 'tseep'
import type { JSONResolvable } from '../types/types'
import fs from 'fs'
import path from 'path'
import url from 'url'

import chalk from 'chalk'
// Force colors to be enabled
chalk.level = 2
// Shortcut for using chalk colors alongside logger
export const { yellow, red, cyan, green, blue } = chalk

type LogLevel = 'error' | 'warn' | 'info' | 'ok' | 'debug'

const logsPath = path.join(path.dirname(url.fileURLToPath(import.meta.url)), '../../logs')
const fileLoggingEnabled = process.env.NODE_ENV !== 'test' && !process.env.VITEST

// one file per process, shared by every module logger
let sharedLogFile: string | null = null

export class Logger extends EventEmitter<{
    error: (data: JSONResolvable) => void
    warn: (data: JSONResolvable) => void
    info: (data: JSONResolvable) => void
    ok: (data: JSONResolvable) => void
    debug: (data: JSONResolvable) => void
}> {
    file: string | null = null
    module: string | undefined
    constructor(module?: string) {
        super()
        if (fileLoggingEnabled) this.file = Logger.logFile()
        this.module = module
    }
    private _log(level: LogLevel, data: JSONResolvable) {
        console.log(logoutput(level, data, this.module, true))
        this.emit(level, logoutput(level, data, this.module))
        this.writeLogLine(logoutput(level, data, this.module))
    }

    error(data: JSONResolvable) {
        this._log('error', data)
    }
    warn(data: JSONResolvable) {
        this._log('warn', data)
    }
    info(data: JSONResolvable) {
        this._log('info', data)
    }
    ok(data: JSONResolvable) {
        this._log('ok', data)
    }
    debug(data: JSONResolvable) {
        this._log('debug', data)
    }

    static logFile(date = formatDate()) {
        if (sharedLogFile) return sharedLogFile
        if (!fs.existsSync(logsPath)) fs.mkdirSync(logsPath, { recursive: true })
        const logFile = path.join(logsPath, `${date}.log`)
        fs.writeFileSync(logFile, '')
        sharedLogFile = logFile
        return logFile
    }
    writeLogLine(str: string) {
        if (!this.file) return
        fs.appendFileSync(this.file, `${str}\n`)
    }
}
export function formatDate() {
    const d = new Date()
    const pad = (n: number) => String(n).padStart(2, '0')
    return `${pad(d.getDate())}.${pad(d.getMonth() + 1)}.${d.getFullYear()}-${pad(d.getHours())}.${pad(d.getMinutes())}.${pad(d.getSeconds())}`
}
function logoutput(level: LogLevel, data: JSONResolvable, module?: string, formatting = false) {
    let str = ''
    const displayLevelsColored = {
        'error': red('error'),
        'warn' : yellow(' warn'),
        'info' : cyan(' info'),
        'ok'   : green('   ok'),
        'debug': blue('debug')
    }
    const displayLevels = {
        'error': 'error',
        'warn' : ' warn',
        'info' : ' info',
        'ok'   : '   ok',
        'debug': 'debug'
    }
    if (module) str += `${formatDate()} - ${formatting ? displayLevelsColored[level] : displayLevels[level]}: [${module}]`
    else str += `${formatDate()} - ${formatting ? displayLevelsColored[level] : displayLevels[level]}:`
    if (typeof data === 'string') str += ` ${data}`
    else str += ` ${JSON.stringify(data)}`
    return str
}
