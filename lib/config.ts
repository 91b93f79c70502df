import { existsSync, readFileSync } from 'node:fs'
import type { StyleProfile } from './markdown'

export interface IStyleConfig {
	readonly name: string
	readonly style: StyleProfile
	readonly width: number | undefined
	readonly partial: boolean
}

export class ConfigError extends Error {
	override name = 'ConfigError'
}

const BOOLEAN_STYLE_KEYS = ['showSectionPrefix', 'reflowText', 'unescape', 'emoji'] as const
const NUMBER_STYLE_KEYS = ['tab'] as const

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function positiveInteger(value: unknown, where: string): number {
	if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${where} must be a positive integer, got ${JSON.stringify(value)}`)
	}
	return value
}

function parseProfile(name: string, raw: unknown): IStyleConfig {
	if (!isRecord(raw)) throw new ConfigError(`Style '${name}' must be an object`)
	const style: StyleProfile = {}
	let width: number | undefined
	let partial = false
	for (const [key, value] of Object.entries(raw)) {
		const where = `${name}.${key}`
		if (BOOLEAN_STYLE_KEYS.some(k => k === key)) {
			if (typeof value !== 'boolean') throw new ConfigError(`${where} must be a boolean`)
			Object.assign(style, { [key]: value })
		} else if (NUMBER_STYLE_KEYS.some(k => k === key)) {
			Object.assign(style, { [key]: positiveInteger(value, where) })
		} else if (key === 'width') {
			width = positiveInteger(value, where)
		} else if (key === 'partial') {
			if (typeof value !== 'boolean') throw new ConfigError(`${where} must be a boolean`)
			partial = value
		} else {
			throw new ConfigError(`Unknown option ${where}`)
		}
	}
	return { name, style, width, partial }
}

/** `{ "dark": { "tab": 2 } }` &rarr; profiles in file order; the first is the default. */
export function parseStyleConfig(json: string): readonly IStyleConfig[] {
	let data: unknown
	try {
		data = JSON.parse(json)
	} catch (err) {
		throw new ConfigError('Style config is not valid JSON', { cause: err })
	}
	if (!isRecord(data)) throw new ConfigError('Style config must map profile names to options')
	return Object.entries(data).map(([name, raw]) => parseProfile(name, raw))
}

/** A missing file means no profiles. */
export function loadStyleConfig(file: string): readonly IStyleConfig[] {
	if (!existsSync(file)) return []
	return parseStyleConfig(readFileSync(file, 'utf-8'))
}

export function pickStyle(configs: readonly IStyleConfig[], name?: string): IStyleConfig | undefined {
	return name ? configs.find(c => c.name === name) : configs[0]
}
