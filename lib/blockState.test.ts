import { describe, expect, it } from 'vitest'
import { finish, initialMachine, step, type IBlockEffect, type IBlockMachine } from './blockState'

function feed(lines: readonly string[], machine: IBlockMachine = initialMachine) {
	const effects: IBlockEffect[] = []
	for (const line of lines) {
		const result = step(machine, line)
		machine = result.machine
		effects.push(...result.effects)
	}
	return { machine, effects }
}

const commit = (...lines: string[]): IBlockEffect => ({ kind: 'commit', lines })

describe('step', () => {
	it('commits headings and thematic breaks right away', () => {
		expect(feed(['# T\n', '***\n']).effects).toEqual([commit('# T\n'), commit('***\n')])
	})

	it('appends blank lines between blocks without a render', () => {
		expect(feed(['\n']).effects).toEqual([{ kind: 'append', lines: ['\n'] }])
	})

	it('buffers a paragraph until a blank line', () => {
		const open = feed(['Hello\n', 'world\n'])
		expect(open.effects).toEqual([])
		expect(open.machine).toEqual({ state: { kind: 'paragraph' }, pending: ['Hello\n', 'world\n'] })

		const closed = feed(['\n'], open.machine)
		expect(closed.effects).toEqual([commit('Hello\n', 'world\n', '\n')])
		expect(closed.machine).toEqual(initialMachine)
	})

	it('turns a paragraph into a setext heading', () => {
		expect(feed(['Title\n', '---\n']).effects).toEqual([commit('Title\n', '---\n')])
	})

	it('closes a paragraph when another block starts', () => {
		expect(feed(['p\n', '# h\n']).effects).toEqual([commit('p\n'), commit('# h\n')])
	})

	it('keeps everything inside a fence verbatim', () => {
		const { effects, machine } = feed(['```\n', '\n', '# not\n', '```\n'])
		expect(effects).toEqual([commit('```\n', '\n', '# not\n', '```\n')])
		expect(machine).toEqual(initialMachine)
	})

	it('needs a closing run as long as the opener', () => {
		const open = feed(['````md\n', '```\n'])
		expect(open.effects).toEqual([])
		expect(feed(['````\n'], open.machine).effects).toEqual([commit('````md\n', '```\n', '````\n')])
	})

	it('flushes list items one sibling at a time', () => {
		const { effects, machine } = feed(['- a\n', '- b\n', '  - c\n', '\n', 'text\n'])
		expect(effects).toEqual([commit('- a\n'), commit('- b\n', '  - c\n', '\n')])
		expect(machine).toEqual({ state: { kind: 'paragraph' }, pending: ['text\n'] })
	})

	it('returns to the list after a nested fence', () => {
		const { effects, machine } = feed(['- a\n', '  ```\n', '  - x\n', '  ```\n'])
		expect(effects).toEqual([])
		expect(machine.state).toEqual({ kind: 'list', list: { baseIndent: 0, lastMarkerIndent: 0 } })
		expect(feed(['- b\n'], machine).effects).toEqual([commit('- a\n', '  ```\n', '  - x\n', '  ```\n')])
	})

	it('returns to the list after a nested table', () => {
		const { effects, machine } = feed(['- a\n', '  | x |\n', '  more\n', '- b\n'])
		expect(effects).toEqual([commit('- a\n', '  | x |\n', '  more\n')])
		expect(machine).toEqual({ state: { kind: 'list', list: { baseIndent: 0, lastMarkerIndent: 0 } }, pending: ['- b\n'] })
	})

	it('returns to the list after a nested blockquote', () => {
		const { effects, machine } = feed(['- a\n', '  > q\n', '  more\n', '- b\n'])
		expect(effects).toEqual([commit('- a\n', '  > q\n', '  more\n')])
		expect(machine).toEqual({ state: { kind: 'list', list: { baseIndent: 0, lastMarkerIndent: 0 } }, pending: ['- b\n'] })
	})

	it('lowers the base indent on an outdented marker', () => {
		const { effects, machine } = feed(['  - a\n', '- b\n'])
		expect(effects).toEqual([commit('  - a\n')])
		expect(machine).toEqual({ state: { kind: 'list', list: { baseIndent: 0, lastMarkerIndent: 0 } }, pending: ['- b\n'] })
	})

	it('flushes at a marker shallower than the last one', () => {
		const { effects, machine } = feed(['- a\n', '    - b\n', '  - c\n'])
		expect(effects).toEqual([commit('- a\n', '    - b\n')])
		expect(machine).toEqual({ state: { kind: 'list', list: { baseIndent: 0, lastMarkerIndent: 2 } }, pending: ['  - c\n'] })
	})

	it('ends a table at the first line without a pipe', () => {
		const { effects, machine } = feed(['| a |\n', '|---|\n', 'para\n'])
		expect(effects).toEqual([commit('| a |\n', '|---|\n')])
		expect(machine).toEqual({ state: { kind: 'paragraph' }, pending: ['para\n'] })
	})

	it('keeps blank lines inside a blockquote', () => {
		const { effects } = feed(['> q\n', '\n', 'x\n'])
		expect(effects).toEqual([commit('> q\n', '\n')])
	})

	it('does not mutate the machine it was given', () => {
		const before = feed(['para\n']).machine
		step(before, 'more\n')
		expect(before.pending).toEqual(['para\n'])
	})
})

describe('finish', () => {
	it('commits the open block', () => {
		const { machine } = feed(['```\n', 'code\n'])
		expect(finish(machine)).toEqual({ machine: initialMachine, effects: [commit('```\n', 'code\n')] })
	})

	it('has nothing to do when no block is open', () => {
		expect(finish(initialMachine).effects).toEqual([])
	})
})
