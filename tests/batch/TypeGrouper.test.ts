import { describe, expect, it } from 'vitest'
import { groupAndOrder, sortByPriority } from 'citrine-batch'
import { createTestModel, node } from './fixtures'

describe('groupAndOrder', () => {
    const model = createTestModel()
    const deps = { typeOf: model.typeOf, priority: model.priority }

    it('buckets by type and orders buckets by priority', () => {
        const groups = groupAndOrder([
            node('r0', 'run'),
            node('t0', 'template'),
            node('s0', 'spec'),
            node('t1', 'template')
        ], deps)

        expect(groups.map(g => g.map(n => n.id))).toEqual([['t0', 't1'], ['s0'], ['r0']])
    })

    it('puts types missing from the table last', () => {
        const groups = groupAndOrder([node('x', 'mystery'), node('r', 'run')], deps)
        expect(groups.map(g => g[0].id)).toEqual(['r', 'x'])
    })

    it('returns nothing for no input', () => {
        expect(groupAndOrder([], deps)).toEqual([])
    })
})

describe('sortByPriority', () => {
    it('is stable within a type', () => {
        const model = createTestModel()
        const sorted = sortByPriority(
            [node('r0', 'run'), node('s0', 'spec'), node('r1', 'run'), node('s1', 'spec')],
            { typeOf: model.typeOf, priority: model.priority }
        )
        expect(sorted.map(n => n.id)).toEqual(['s0', 's1', 'r0', 'r1'])
    })
})
