import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

/**
 * Global test setup and teardown
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.enableConsoleOutput = 'false'
}

export async function teardown(): Promise<void> {
  // Worker processes remove their own database files; sweep any left by a
  // crashed worker
  const tmp = os.tmpdir()
  try {
    for (const entry of fs.readdirSync(tmp)) {
      if (entry.startsWith('medialist-sync-test-')) {
        fs.rmSync(path.join(tmp, entry), { force: true })
      }
    }
  } catch (error) {
    console.error('Failed to clean up test databases:', error)
  }
}
