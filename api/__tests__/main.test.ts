import { describe, it, expect } from 'vitest'
import path from 'path'
import { main, USAGE } from '../main.js'
import type { CommandContext } from '../commands/context.js'
import { ConfigStore } from '../services/ConfigStore.js'
import { FanoutService } from '../services/FanoutService.js'
import { TransferService } from '../services/TransferService.js'
import type { AppConfig } from '../types/index.js'
import { AuthError } from '../utils/errors.js'
import { MemoryTransferClient } from './helpers/MemoryTransferClient.js'
import { ScriptedPrompter, type Answer } from './helpers/ScriptedPrompter.js'
import { makeTree } from './helpers/tmp.js'

const config: AppConfig = {
  ssh_key_path: '/unused/id_ed25519',
  destinations: [
    { name: 'nas', host: 'nas.local', port: 22, username: 'backup', remote_path: '/srv', password: 'test-secret' },
    { name: 'vps', host: 'vps.example.com', port: 22, username: 'deploy', remote_path: '/uploads', password: 'test-secret' },
  ],
}

async function context(saved: AppConfig | null, answers: Answer[] = [], rejectHost?: string) {
  const dir = await makeTree('cli', { 'photo.png': 'png-bytes' })
  const store = new ConfigStore(path.join(dir, 'config'))
  if (saved) {
    await store.save(saved)
  }
  const clients: MemoryTransferClient[] = []
  const prompters: ScriptedPrompter[] = []
  const out: string[] = []
  const err: string[] = []
  const ctx: CommandContext = {
    store,
    fanout: new FanoutService(new TransferService(() => {
      const client = new MemoryTransferClient({
        connectError: options => (options.host === rejectHost ? new AuthError('Authentication failed') : undefined),
      })
      clients.push(client)
      return client
    })),
    openPrompter: () => {
      const prompter = new ScriptedPrompter([...answers])
      prompters.push(prompter)
      return prompter
    },
    print: line => { out.push(line) },
    printError: line => { err.push(line) },
  }
  return { ctx, file: path.join(dir, 'photo.png'), clients, prompters, out, err }
}

describe('main', () => {
  it('uploads to every configured destination', async () => {
    const t = await context(config)

    const code = await main([t.file], t.ctx)

    expect(code).toBe(0)
    expect(t.out[0]).toBe('\n📦 Uploading to 2 destinations\n')
    expect(t.out).toContain('[nas] ✓ Uploaded photo.png')
    expect(t.out).toContain('[vps] ✓ Uploaded photo.png')
    expect(t.out).toContain('✓ Completed upload to nas')
    expect(t.out).toContain('✓ Completed upload to vps')
    expect(t.out[t.out.length - 1]).toBe('\n✨ Done!\n')
    expect(t.clients.map(c => [...c.files.keys()]).flat().sort()).toEqual(['/srv/photo.png', '/uploads/photo.png'])
    expect(t.prompters).toHaveLength(0)
  })

  it('uploads to a single destination chosen interactively', async () => {
    const t = await context(config, [1])

    const code = await main([t.file, '--interactive'], t.ctx)

    expect(code).toBe(0)
    expect(t.out[0]).toBe('\n📦 Uploading to vps (vps.example.com)\n')
    expect(t.clients).toHaveLength(1)
    expect(t.clients[0].files.get('/uploads/photo.png')?.toString()).toBe('png-bytes')
    expect(t.prompters[0].closed).toBe(true)
  })

  it('exits with 1 when any destination fails', async () => {
    const t = await context(config, [], 'vps.example.com')

    const code = await main([t.file], t.ctx)

    expect(code).toBe(1)
    expect(t.err).toEqual(['\n❌ Errors occurred:', '  vps: [AUTH_ERROR] Authentication failed'])
    expect(t.out.some(line => line.startsWith('📊 nas: 0.00 MB in '))).toBe(true)
  })

  it('refuses to run without destinations', async () => {
    const t = await context({ ssh_key_path: '/k', destinations: [] })

    expect(await main([t.file], t.ctx)).toBe(1)
    expect(t.err).toEqual(["Error: No destinations configured. Run 'sftp-fanout --setup' to add one."])
  })

  it('prints usage when no path is given', async () => {
    const t = await context(config)

    expect(await main([], t.ctx)).toBe(0)
    expect(t.out).toEqual([USAGE])
  })

  it('runs the setup wizard with --setup', async () => {
    const t = await context(config, [4])

    expect(await main(['--setup'], t.ctx)).toBe(0)
    expect(t.prompters[0].questions).toEqual(['What would you like to do?'])
    expect(t.out).toContain('\nCancelled.\n')
  })

  it('runs the setup wizard first when nothing is configured', async () => {
    const t = await context(null, ['/missing/key'])

    await expect(main([t.file], t.ctx)).rejects.toThrow('SSH key not found at: /missing/key')
    expect(t.out[0]).toBe('No configuration found. Running setup...\n')
  })
})
