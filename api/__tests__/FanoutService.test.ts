import { describe, it, expect } from 'vitest'
import path from 'path'
import { FanoutService } from '../services/FanoutService.js'
import { TransferService, type TransferOptions } from '../services/TransferService.js'
import type { Destination, TransferStats } from '../types/index.js'
import { AuthError } from '../utils/errors.js'
import { MemoryTransferClient } from './helpers/MemoryTransferClient.js'
import { makeTree } from './helpers/tmp.js'

function destination(name: string, host: string): Destination {
  return {
    name,
    host,
    port: 22,
    username: 'backup',
    remotePath: `/srv/${name}`,
    credential: { type: 'password', password: 'test-secret' },
  }
}

class StubTransferService extends TransferService {
  constructor(private impl: (destination: Destination) => Promise<TransferStats>) {
    super()
  }

  override transfer(destination: Destination, _localPath: string, _options?: TransferOptions): Promise<TransferStats> {
    return this.impl(destination)
  }
}

describe('FanoutService', () => {
  it('collects successes and failures without letting one destination stop another', async () => {
    const tmp = await makeTree('fanout', { 'a.txt': 'hello' })
    const clients: MemoryTransferClient[] = []
    const transferService = new TransferService(() => {
      const client = new MemoryTransferClient({
        connectError: options =>
          options.host === 'bad.example'
            ? new AuthError('Password authentication failed: All configured authentication methods failed')
            : undefined,
      })
      clients.push(client)
      return client
    })

    const report = await new FanoutService(transferService).run(
      [destination('alpha', 'bad.example'), destination('beta', 'good.example')],
      path.join(tmp, 'a.txt'),
    )

    expect(report.ok).toBe(false)
    expect(report.successes).toHaveLength(1)
    expect(report.successes[0].destination).toBe('beta')
    expect(report.successes[0].stats.bytesTransferred).toBe(5)
    expect(report.failures).toHaveLength(1)
    expect(report.failures[0].destination).toBe('alpha')
    expect(report.failures[0].error).toBeInstanceOf(AuthError)
    expect(report.failures[0].error.destination).toBe('alpha')

    const good = clients.find(c => c.connectOptions?.host === 'good.example')
    expect(good?.files.get('/srv/beta/a.txt')?.toString()).toBe('hello')
  })

  it('reports overall success only when every destination succeeds', async () => {
    const service = new StubTransferService(async () => ({ bytesTransferred: 10, durationSecs: 0.5 }))

    const report = await new FanoutService(service).run(
      [destination('alpha', 'a.example'), destination('beta', 'b.example')],
      '/unused',
    )

    expect(report.ok).toBe(true)
    expect(report.failures).toEqual([])
    expect(report.successes).toEqual([
      { destination: 'alpha', stats: { bytesTransferred: 10, durationSecs: 0.5 } },
      { destination: 'beta', stats: { bytesTransferred: 10, durationSecs: 0.5 } },
    ])
  })

  it('turns an unexpected fault into a recorded error for that destination', async () => {
    const service = new StubTransferService(async d => {
      if (d.name === 'alpha') {
        throw new TypeError('boom')
      }
      return { bytesTransferred: 1, durationSecs: 0.1 }
    })

    const report = await new FanoutService(service).run(
      [destination('alpha', 'a.example'), destination('beta', 'b.example')],
      '/unused',
    )

    expect(report.ok).toBe(false)
    expect(report.successes.map(s => s.destination)).toEqual(['beta'])
    expect(report.failures).toHaveLength(1)
    expect(report.failures[0].error.code).toBe('UNEXPECTED_ERROR')
    expect(report.failures[0].error.message).toBe('Transfer task crashed: boom')
    expect(report.failures[0].error.destination).toBe('alpha')
  })

  it('announces each destination as soon as it completes', async () => {
    const events: string[] = []
    const service = new StubTransferService(async d => {
      if (d.name === 'alpha') {
        throw new AuthError('Authentication failed')
      }
      return { bytesTransferred: 4, durationSecs: 0.2 }
    })

    await new FanoutService(service).run([destination('alpha', 'a.example'), destination('beta', 'b.example')], '/unused', {
      observer: {
        onDestinationComplete: (name, stats) => {
          events.push(`${name}:${stats.bytesTransferred}`)
        },
      },
    })

    expect(events).toEqual(['beta:4'])
  })

  it('runs every destination at the same time', async () => {
    const started: string[] = []
    let release: () => void = () => {}
    const gate = new Promise<void>(resolve => {
      release = resolve
    })
    let allStarted: () => void = () => {}
    const everyoneStarted = new Promise<void>(resolve => {
      allStarted = resolve
    })

    const service = new StubTransferService(async d => {
      started.push(d.name)
      if (started.length === 3) {
        allStarted()
      }
      await gate
      return { bytesTransferred: 0, durationSecs: 0.1 }
    })

    const run = new FanoutService(service).run(
      [destination('a', 'a.example'), destination('b', 'b.example'), destination('c', 'c.example')],
      '/unused',
    )
    await everyoneStarted
    expect(started.sort()).toEqual(['a', 'b', 'c'])

    release()
    const report = await run
    expect(report.successes).toHaveLength(3)
  })

  it('treats an empty destination list as a successful no-op', async () => {
    const report = await new FanoutService(new StubTransferService(async () => ({ bytesTransferred: 0, durationSecs: 0 }))).run([], '/unused')

    expect(report).toEqual({ successes: [], failures: [], ok: true })
  })
})
