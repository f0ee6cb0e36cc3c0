import { describe, it, expect } from 'vitest'
import { substituteTemplate, substituteValues } from '../src/substitution.js'
import type { TemplateScope } from '../src/types.js'

const scope: TemplateScope = {
  Release: { Name: 'gb', Namespace: 'analytics', Service: 'Helm' },
  Chart: { Name: 'growthbook', Version: '0.1.0', AppVersion: 'latest' },
  Values: {
    domain: 'example.com',
    ingress: { enabled: true },
    retries: 3,
    empty: null
  }
}

describe('substituteTemplate', () => {
  it('should return strings without references unchanged', () => {
    expect(substituteTemplate('https://growthbook.local', scope)).toBe(
      'https://growthbook.local'
    )
  })

  it('should resolve helm-style references with a leading dot', () => {
    expect(substituteTemplate('{{ .Release.Name }}-mongodb', scope)).toBe('gb-mongodb')
  })

  it('should resolve references without a leading dot', () => {
    expect(substituteTemplate('{{Release.Namespace}}', scope)).toBe('analytics')
  })

  it('should not HTML-escape rendered values', () => {
    const withQuery: TemplateScope = {
      ...scope,
      Values: { query: 'a=1&b=<2>' }
    }

    expect(substituteTemplate('https://x/?{{ .Values.query }}', withQuery)).toBe(
      'https://x/?a=1&b=<2>'
    )
  })

  it('should render several references and numbers', () => {
    expect(
      substituteTemplate(
        'https://{{ .Release.Name }}.{{ .Values.domain }}/?retries={{ .Values.retries }}',
        scope
      )
    ).toBe('https://gb.example.com/?retries=3')
  })

  it('should reject an unknown reference and name the value path', () => {
    expect(() =>
      substituteTemplate('{{ .Values.missing }}', scope, 'global.env[0].value')
    ).toThrow("Unknown template reference 'Values.missing' in global.env[0].value")
  })

  it('should list every unknown reference', () => {
    expect(() => substituteTemplate('{{ .Values.a }}-{{ .Values.empty }}', scope)).toThrow(
      "Unknown template references 'Values.a', 'Values.empty'"
    )
  })

  it('should reject a template that does not parse', () => {
    expect(() => substituteTemplate('{{#Values.ingress}}open', scope, 'x')).toThrow(
      /^Invalid template in x: /
    )
  })
})

describe('substituteValues', () => {
  it('should substitute string leaves in mappings and lists', () => {
    const document = {
      global: {
        env: [
          { name: 'APP_ORIGIN', value: 'https://{{ .Release.Name }}.{{ .Values.domain }}' }
        ]
      },
      backend: { replicaCount: 2, mongodbUri: null }
    }

    expect(substituteValues(document, scope)).toEqual({
      global: {
        env: [{ name: 'APP_ORIGIN', value: 'https://gb.example.com' }]
      },
      backend: { replicaCount: 2, mongodbUri: null }
    })
  })

  it('should not mutate the input document', () => {
    const document = { host: '{{ .Release.Name }}.local' }

    substituteValues(document, scope)

    expect(document.host).toBe('{{ .Release.Name }}.local')
  })

  it('should report the path of the failing leaf', () => {
    const document = { backend: { env: [{ name: 'A', value: '{{ .Values.nope }}' }] } }

    expect(() => substituteValues(document, scope)).toThrow(
      "Unknown template reference 'Values.nope' in backend.env[0].value"
    )
  })
})
