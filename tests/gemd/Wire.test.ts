import { describe, expect, it } from 'vitest'
import { createLink, fromWire, gemd, toWire } from 'citrine-gemd'

describe('toWire', () => {
    it('writes references as links and renames sample type', () => {
        const spec = gemd.materialSpec({ name: 'cake spec', uids: { custom: 'c', id: 's1' } })
        const run = gemd.materialRun({ name: 'cake', uids: { id: 'm1' }, spec, sampleType: 'experimental' })

        expect(toWire(run)).toEqual({
            type: 'material_run',
            uids: { id: 'm1' },
            tags: [],
            name: 'cake',
            spec: { type: 'link_by_uid', scope: 'id', id: 's1' },
            sample_type: 'experimental'
        })
    })

    it('drops unset fields', () => {
        const wire = toWire(gemd.processSpec({ name: 'bake', uids: { id: 'p1' } }))
        expect(Object.keys(wire).sort()).toEqual(['conditions', 'name', 'parameters', 'tags', 'type', 'uids'])
    })

    it('writes templated attributes as pairs', () => {
        const density = gemd.propertyTemplate({ name: 'density', uids: { id: 'd1' }, bounds: { type: 'real_bounds' } })
        const color = gemd.propertyTemplate({ name: 'color', uids: { id: 'c1' }, bounds: { type: 'categorical_bounds' } })
        const template = gemd.materialTemplate({
            name: 'cake',
            properties: [{ template: density, bounds: { type: 'real_bounds', lower_bound: 0 } }, { template: color }]
        })

        expect(toWire(template, { uidsOf: () => ({ id: 'mt' }) }).properties).toEqual([
            [{ type: 'link_by_uid', scope: 'id', id: 'd1' }, { type: 'real_bounds', lower_bound: 0 }],
            [{ type: 'link_by_uid', scope: 'id', id: 'c1' }, null]
        ])
    })

    it('resolves uids through uidsOf', () => {
        const spec = gemd.materialSpec({ name: 'cake spec' })
        const run = gemd.materialRun({ name: 'cake', spec })
        const uidsOf = (entity: { name: string }) => ({ tmp: entity.name === 'cake' ? 'r' : 's' })

        expect(toWire(run, { uidsOf })).toMatchObject({
            uids: { tmp: 'r' },
            spec: { type: 'link_by_uid', scope: 'tmp', id: 's' }
        })
    })

    it('refuses references without uids', () => {
        const run = gemd.materialRun({ name: 'cake', spec: gemd.materialSpec({ name: 'cake spec' }) })
        expect(() => toWire(run)).toThrow(expect.objectContaining({ code: 'UNIDENTIFIED_REFERENCE' }))
    })
})

describe('fromWire', () => {
    it('builds a material run', () => {
        expect(fromWire({
            type: 'material_run',
            name: 'cake',
            uids: { id: 'm1' },
            spec: { type: 'link_by_uid', scope: 'id', id: 's1' },
            sample_type: 'virtual'
        })).toEqual({
            type: 'material_run',
            name: 'cake',
            uids: { id: 'm1' },
            tags: [],
            spec: createLink('id', 's1'),
            sampleType: 'virtual'
        })
    })

    it('reads templated attribute pairs', () => {
        const built = fromWire({
            type: 'process_template',
            name: 'bake',
            conditions: [[{ type: 'link_by_uid', scope: 'id', id: 't1' }, null]]
        })
        expect(built).toEqual({
            type: 'process_template',
            name: 'bake',
            uids: {},
            tags: [],
            conditions: [{ template: createLink('id', 't1') }],
            parameters: []
        })
    })

    it('reads null fields as absent', () => {
        const built = fromWire({
            type: 'process_run',
            name: 'bake run',
            uids: { id: 'r1' },
            tags: null,
            notes: null,
            spec: null,
            conditions: [{
                type: 'condition',
                name: 'temperature',
                template: null,
                origin: null,
                notes: null,
                value: { type: 'nominal_real', nominal: 180, units: 'degC' }
            }],
            parameters: null
        })

        expect(built).toEqual({
            type: 'process_run',
            name: 'bake run',
            uids: { id: 'r1' },
            tags: [],
            conditions: [{
                type: 'condition',
                name: 'temperature',
                value: { type: 'nominal_real', nominal: 180, units: 'degC' }
            }],
            parameters: []
        })
        expect(Object.keys(built).sort()).toEqual(['conditions', 'name', 'parameters', 'tags', 'type', 'uids'])
    })

    it('reads null bounds on templated attributes', () => {
        const built = fromWire({
            type: 'material_template',
            name: 'cake',
            description: null,
            properties: [[{ type: 'link_by_uid', scope: 'id', id: 'd1' }, null]]
        })
        expect(built).toEqual({
            type: 'material_template',
            name: 'cake',
            uids: {},
            tags: [],
            properties: [{ template: createLink('id', 'd1') }]
        })
    })

    it('rejects unknown types with a coded error', () => {
        expect(() => fromWire({ type: 'dataset', name: 'nope' })).toThrow(expect.objectContaining({
            code: 'INVALID_ENTITY',
            message: expect.stringMatching(/^\[gemd\] validation failed:/)
        }))
    })
})
