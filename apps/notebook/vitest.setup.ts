import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

process.env.NODE_ENV = 'test'
process.env.NOTEBOOK_WORKSPACE_DIR ??= mkdtempSync(join(tmpdir(), 'notebook-test-'))
