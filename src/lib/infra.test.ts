import { describe, expect, test } from 'vitest'
import { parseComposeText } from './document.ts'
import { attachInfraNetworks } from './infra.ts'

const infra = parseComposeText('networks:\n  proxy:\n    driver: bridge\n  monitoring:\n    driver: bridge\n')

describe('attachInfraNetworks', () => {
  test('adds networks found only in the infra file as external', () => {
    const document = { services: [{ name: 'web', networks: ['proxy', 'backend'] }], networks: [] }

    expect(attachInfraNetworks(document, null, infra)).toEqual({
      services: document.services,
      networks: [{ name: 'proxy', external: true }],
    })
  })

  test('prefers networks already defined in the target file or the document', () => {
    const tree = parseComposeText('networks:\n  proxy:\n    external: true\n')
    const document = {
      services: [{ name: 'web', networks: ['proxy', 'monitoring'] }],
      networks: [{ name: 'monitoring', driver: 'bridge' as const }],
    }

    expect(attachInfraNetworks(document, tree, infra).networks).toEqual([{ name: 'monitoring', driver: 'bridge' }])
  })

  test('adds each network once', () => {
    const document = {
      services: [
        { name: 'web', networks: ['proxy'] },
        { name: 'api', networks: ['proxy'] },
      ],
      networks: [],
    }

    expect(attachInfraNetworks(document, null, infra).networks).toEqual([{ name: 'proxy', external: true }])
  })

  test('returns the document unchanged without an infra file', () => {
    const document = { services: [{ name: 'web', networks: ['proxy'] }], networks: [] }

    expect(attachInfraNetworks(document, null, null)).toBe(document)
  })
})
