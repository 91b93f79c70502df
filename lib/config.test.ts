import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, describe, expect, it } from 'vitest'
import { ConfigError, loadStyleConfig, parseStyleConfig, pickStyle } from './config'

const dir = mkdtempSync(join(tmpdir(), 'mdstream-config-'))
afterAll(() => rmSync(dir, { recursive: true, force: true }))

describe('parseStyleConfig', () => {
	it('reads profiles in file order', () => {
		const configs = parseStyleConfig('{ "wide": { "width": 120, "tab": 4 }, "plain": { "emoji": false, "partial": true } }')
		expect(configs).toEqual([
			{ name: 'wide', style: { tab: 4 }, width: 120, partial: false },
			{ name: 'plain', style: { emoji: false }, width: undefined, partial: true },
		])
	})

	it('rejects unknown options', () => {
		expect(() => parseStyleConfig('{ "x": { "colour": true } }')).toThrow('Unknown option x.colour')
	})

	it('rejects options of the wrong type', () => {
		expect(() => parseStyleConfig('{ "x": { "width": 0 } }')).toThrow('x.width must be a positive integer, got 0')
		expect(() => parseStyleConfig('{ "x": { "reflowText": "yes" } }')).toThrow('x.reflowText must be a boolean')
		expect(() => parseStyleConfig('{ "x": 1 }')).toThrow("Style 'x' must be an object")
	})

	it('wraps invalid JSON', () => {
		expect(() => parseStyleConfig('{')).toThrow(ConfigError)
		expect(() => parseStyleConfig('[]')).toThrow('Style config must map profile names to options')
	})
})

describe('loadStyleConfig', () => {
	it('treats a missing file as no profiles', () => {
		expect(loadStyleConfig(join(dir, 'missing.json'))).toEqual([])
	})

	it('loads a file', () => {
		const file = join(dir, 'styles.json')
		writeFileSync(file, '{ "narrow": { "width": 40 } }')
		expect(loadStyleConfig(file).map(c => c.name)).toEqual(['narrow'])
	})
})

describe('pickStyle', () => {
	const configs = parseStyleConfig('{ "a": {}, "b": {} }')

	it('defaults to the first profile', () => {
		expect(pickStyle(configs)?.name).toBe('a')
		expect(pickStyle([])).toBeUndefined()
	})

	it('finds a profile by name', () => {
		expect(pickStyle(configs, 'b')?.name).toBe('b')
		expect(pickStyle(configs, 'c')).toBeUndefined()
	})
})
