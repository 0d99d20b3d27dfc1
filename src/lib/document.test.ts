import { mkdtempSync } from 'fs'
import { readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { AUTO_UPDATE_LABEL } from '../types.ts'
import {
  ComposeParseError,
  ComposeWriteError,
  initComposeFile,
  loadComposeFile,
  parseComposeText,
  readComposeDocument,
  serializeComposeTree,
  writeComposeFile,
} from './document.ts'

describe('parseComposeText', () => {
  test('rejects invalid YAML', () => {
    expect(() => parseComposeText('services: [', 'compose.yml')).toThrow(ComposeParseError)
    expect(() => parseComposeText('services: [', 'compose.yml')).toThrow(/^Invalid YAML in compose\.yml: /)
  })

  test('rejects duplicate keys', () => {
    expect(() => parseComposeText('services:\n  web: {}\n  web: {}\n')).toThrow(ComposeParseError)
  })

  test('rejects a document that is not a mapping', () => {
    expect(() => parseComposeText('- web\n- db\n')).toThrow('compose file must contain a mapping at the root')
  })

  test('accepts an empty document', () => {
    const tree = parseComposeText('')
    expect(readComposeDocument(tree)).toEqual({ services: [], networks: [] })
  })

  test('detects the indentation width', () => {
    expect(parseComposeText('services:\n    web:\n        image: nginx\n').indent).toBe(4)
    expect(parseComposeText('# only a comment\nservices: {}\n').indent).toBe(2)
  })

  test('detects whether sequences are indented below their key', () => {
    expect(parseComposeText('services:\n  web:\n    ports:\n    - 80:80\n').indentSeq).toBe(false)
    expect(parseComposeText('services:\n  web:\n    ports:\n      - 80:80\n').indentSeq).toBe(true)
    expect(parseComposeText('services:\n  web:\n    # published\n    ports: # web\n\n    - 80:80\n').indentSeq).toBe(false)
    expect(parseComposeText('services:\n  web:\n    image: nginx\n').indentSeq).toBe(true)
  })

  test('writes untouched documents back unchanged', () => {
    const text = [
      '# shared stack',
      'services:',
      '  db:',
      '    restart: always',
      '    image: postgres:16 # pinned',
      '',
      '  cache:',
      '    image: "redis:7"',
      '',
    ].join('\n')

    expect(serializeComposeTree(parseComposeText(text))).toBe(text)
  })
})

describe('readComposeDocument', () => {
  test('reads services and networks in either syntax', () => {
    const tree = parseComposeText(
      [
        'services:',
        '  web:',
        '    container_name: web',
        '    image: nginx',
        '    restart: unless-stopped',
        '    networks: [proxy]',
        '    ports:',
        '      - 8080:80',
        '    environment:',
        '      - TZ=UTC',
        '    labels:',
        '      traefik.enable: "true"',
        `      ${AUTO_UPDATE_LABEL}: "false"`,
        '    deploy:',
        '      resources:',
        '        limits:',
        '          cpus: "0.5"',
        'networks:',
        '  proxy:',
        '    external: true',
        '  backend:',
        '    driver: bridge',
        '    internal: true',
        '',
      ].join('\n')
    )

    expect(readComposeDocument(tree)).toEqual({
      services: [
        {
          name: 'web',
          containerName: 'web',
          image: 'nginx',
          restart: 'unless-stopped',
          networks: ['proxy'],
          ports: [{ host: '8080', container: '80' }],
          environment: { TZ: 'UTC' },
          labels: { 'traefik.enable': 'true' },
          resources: { cpuLimit: 0.5 },
          autoUpdate: false,
        },
      ],
      networks: [
        { name: 'proxy', external: true },
        { name: 'backend', driver: 'bridge', internal: true },
      ],
    })
  })
})

describe('files', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'compose-manager-document-test-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  test('loadComposeFile returns null for a missing file', async () => {
    expect(await loadComposeFile(join(dir, 'compose.yml'))).toBeNull()
  })

  test('loadComposeFile names the file in parse errors', async () => {
    const path = join(dir, 'compose.yml')
    await writeFile(path, '- web\n')

    await expect(loadComposeFile(path)).rejects.toThrow(`${path} must contain a mapping at the root`)
  })

  test('initComposeFile creates empty sections once', async () => {
    const path = join(dir, 'compose.yml')

    expect(await initComposeFile(path)).toBe(true)
    expect(await readFile(path, 'utf-8')).toBe('services: {}\nnetworks: {}\n')

    await writeFile(path, 'services:\n  web:\n    image: nginx\n')
    expect(await initComposeFile(path)).toBe(false)
    expect(await readFile(path, 'utf-8')).toBe('services:\n  web:\n    image: nginx\n')
  })

  test('writeComposeFile reports failures as ComposeWriteError', async () => {
    const blocker = join(dir, 'not-a-directory')
    await writeFile(blocker, '')

    await expect(writeComposeFile(parseComposeText('services: {}\n'), join(blocker, 'compose.yml'))).rejects.toThrow(
      ComposeWriteError
    )
  })
})
