import { describe, expect, it } from 'vitest'
import { applyRegistrationUpdates, registerAll } from 'citrine-client'
import type { RegisterAllDeps } from 'citrine-client'
import { gemd } from 'citrine-gemd'
import { createCodedError, isCodedError } from 'citrine-shared'
import { MemoryTransport } from './fixtures'

const PATH = 'teams/t1/datasets/d1/storables/batch'

function bakingHistory() {
    const template = gemd.processTemplate({ name: 'bake template' })
    const spec = gemd.processSpec({ name: 'bake', template })
    const material = gemd.materialSpec({ name: 'cake spec', uids: { id: 'ms-1' }, process: spec })
    return { template, spec, material }
}

function createDeps(transport: MemoryTransport): RegisterAllDeps {
    let next = 0
    return {
        transport,
        path: PATH,
        createUid: () => `uid-${++next}`,
        createScope: () => 'tmp'
    }
}

describe('registerAll', () => {
    it('writes in type order and reports settled identity', async () => {
        const { template, spec, material } = bakingHistory()
        const transport = new MemoryTransport({ tags: ['normalized'] })

        const result = await registerAll([material, spec, template], createDeps(transport))

        expect(transport.batches).toHaveLength(1)
        expect(transport.batches[0].params).toEqual({ dry_run: false })
        expect(transport.batches[0].objects).toEqual([
            {
                type: 'process_template',
                uids: { id: 'uid-1' },
                tags: [],
                name: 'bake template',
                conditions: [],
                parameters: []
            },
            {
                type: 'process_spec',
                uids: { id: 'uid-2' },
                tags: [],
                name: 'bake',
                template: { type: 'link_by_uid', scope: 'id', id: 'uid-1' },
                conditions: [],
                parameters: []
            },
            {
                type: 'material_spec',
                uids: { id: 'ms-1' },
                tags: [],
                name: 'cake spec',
                process: { type: 'link_by_uid', scope: 'id', id: 'uid-2' },
                properties: []
            }
        ])

        expect(result.registered.map(e => e.type)).toEqual(['process_template', 'process_spec', 'material_spec'])
        expect(result.updates).toEqual([
            { original: template, uids: { id: 'uid-1' }, tags: ['normalized'] },
            { original: spec, uids: { id: 'uid-2' }, tags: ['normalized'] },
            { original: material, uids: { id: 'ms-1' }, tags: ['normalized'] }
        ])
    })

    it('leaves caller objects alone until updates are applied', async () => {
        const { template, spec, material } = bakingHistory()
        const result = await registerAll([material, spec, template], createDeps(new MemoryTransport({ tags: ['normalized'] })))

        expect(template.uids).toEqual({})
        expect(template.tags).toEqual([])

        applyRegistrationUpdates(result.updates)
        expect(template.uids).toEqual({ id: 'uid-1' })
        expect(template.tags).toEqual(['normalized'])
        expect(material.uids).toEqual({ id: 'ms-1' })
    })

    it('links to unregistered references without submitting them', async () => {
        const { template, spec } = bakingHistory()
        const transport = new MemoryTransport()

        await registerAll([spec], createDeps(transport))

        expect(transport.batches.map(b => b.objects.map(o => o.name))).toEqual([['bake']])
        expect(transport.batches[0].objects[0].template).toEqual({ type: 'link_by_uid', scope: 'id', id: 'uid-1' })
        expect(template.uids).toEqual({})
    })

    it('dry-runs self-contained batches under a throwaway scope', async () => {
        const { material } = bakingHistory()
        const transport = new MemoryTransport()

        const result = await registerAll([material], createDeps(transport), { dryRun: true, includeNested: true })

        expect(transport.batches).toHaveLength(1)
        expect(transport.batches[0].params).toEqual({ dry_run: true })
        expect(transport.batches[0].objects.map(o => o.uids)).toEqual([{ tmp: 'uid-1' }, { tmp: 'uid-2' }, { id: 'ms-1' }])
        expect(transport.batches[0].objects[2].process).toEqual({ type: 'link_by_uid', scope: 'tmp', id: 'uid-2' })

        expect(result.registered.map(e => e.uids)).toEqual([{}, {}, { id: 'ms-1' }])
        expect(result.updates.map(u => u.uids)).toEqual([{}, {}, { id: 'ms-1' }])
    })

    it('reads null fields in the built objects as absent', async () => {
        const { template, spec, material } = bakingHistory()
        const transport = new MemoryTransport({
            extra: { tags: null, notes: null, description: null, template: null, process: null }
        })

        const result = await registerAll([material, spec, template], createDeps(transport))

        expect(result.registered.map(e => e.name)).toEqual(['bake template', 'bake', 'cake spec'])
        expect('template' in result.registered[1]).toBe(false)
        expect('process' in result.registered[2]).toBe(false)
        expect(result.updates).toEqual([
            { original: template, uids: { id: 'uid-1' }, tags: [] },
            { original: spec, uids: { id: 'uid-2' }, tags: [] },
            { original: material, uids: { id: 'ms-1' }, tags: [] }
        ])
    })

    it('reports a built object it cannot read as an invalid response', async () => {
        const { template } = bakingHistory()
        const transport = new MemoryTransport({ extra: { name: 42 } })

        const error = await registerAll([template], createDeps(transport)).catch((reason: unknown) => reason)

        expect(error).toMatchObject({
            code: 'INVALID_RESPONSE',
            message: `Unexpected response from ${PATH}: object 0 of batch 1/1 is not a GEMD entity`
        })
        expect(error instanceof Error && isCodedError(error.cause) ? error.cause.code : undefined).toBe('INVALID_ENTITY')
        expect(transport.batches).toHaveLength(1)
    })

    it('stops at the first failed batch', async () => {
        const { template, spec, material } = bakingHistory()
        const error = createCodedError({ code: 'SERVER_ERROR', message: 'boom', retryable: true })
        const transport = new MemoryTransport({ failBatch: { index: 1, error } })

        await expect(registerAll([template, spec, material], createDeps(transport), { batchSize: 1 })).rejects.toBe(error)
        expect(transport.batches.map(b => b.objects.map(o => o.name))).toEqual([['bake template'], ['bake']])
    })

    it('rejects an unbatchable graph before sending anything', async () => {
        const { template, spec, material } = bakingHistory()
        const transport = new MemoryTransport()

        await expect(registerAll([template, spec, material], createDeps(transport), { dryRun: true, batchSize: 1 }))
            .rejects.toMatchObject({ code: 'OVERSIZED_DEPENDENCY' })
        expect(transport.batches).toEqual([])
    })
})
