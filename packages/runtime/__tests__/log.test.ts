import { Writable } from 'node:stream'
import { describe, it, expect, vi } from 'vitest'
import * as winston from 'winston'
import { createDefaultLogger, createLevelFilter, createWinstonLogSink } from '../src/log.js'
import type { LogEntry } from '../src/log.js'
import { createMemoryLogSink } from './fixtures.js'

const infoEntry: LogEntry = { level: 'info', user: 1, message: 'user confirmed', meta: {} }
const warnEntry: LogEntry = { level: 'warn', user: null, message: 'invalid token', meta: {} }

describe('log', () => {
  describe('createLevelFilter', () => {
    it('should pass info and warn at info level', () => {
      const sink = createMemoryLogSink()
      const filter = createLevelFilter(sink, 'info')
      filter.log(infoEntry)
      filter.log(warnEntry)
      expect(sink.entries).toEqual([infoEntry, warnEntry])
    })

    it('should drop info entries at warn level', () => {
      const sink = createMemoryLogSink()
      const filter = createLevelFilter(sink, 'warn')
      filter.log(infoEntry)
      filter.log(warnEntry)
      expect(sink.entries).toEqual([warnEntry])
    })

    it('should drop everything when logging is disabled', () => {
      const sink = createMemoryLogSink()
      const filter = createLevelFilter(sink, false)
      filter.log(infoEntry)
      filter.log(warnEntry)
      expect(sink.entries).toEqual([])
    })
  })

  describe('createDefaultLogger', () => {
    it('should use the configured level', () => {
      const logger = createDefaultLogger('warn')
      expect(logger.level).toBe('warn')
      expect(logger.silent).toBe(false)
    })

    it('should be silent when logging is disabled', () => {
      expect(createDefaultLogger(false).silent).toBe(true)
    })
  })

  describe('createWinstonLogSink', () => {
    it('should write the entry as one JSON record', async () => {
      const lines: string[] = []
      const stream = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          lines.push(chunk.toString('utf8'))
          callback()
        },
      })
      const logger = winston.createLogger({
        level: 'info',
        format: winston.format.json(),
        transports: [new winston.transports.Stream({ stream })],
      })

      createWinstonLogSink(logger).log({
        level: 'warn',
        user: 7,
        message: 'user already confirmed',
        meta: { requestId: 'req-1' },
      })

      await vi.waitFor(() => expect(lines).toHaveLength(1))
      expect(JSON.parse(lines[0] ?? '')).toEqual({
        level: 'warn',
        message: 'user already confirmed',
        requestId: 'req-1',
        user: 7,
      })
    })
  })
})
