import { describe, it, expect } from 'vitest'
import fs from 'fs-extra'
import path from 'path'
import { makeTree, removeTrees } from './helpers/tmp.js'

describe('makeTree', () => {
  it('writes nested files and removes them again', async () => {
    const root = await makeTree('tree', { 'sub/a.txt': 'a' })

    expect(await fs.readFile(path.join(root, 'sub/a.txt'), 'utf8')).toBe('a')

    await removeTrees()
    expect(await fs.pathExists(root)).toBe(false)
  })
})
