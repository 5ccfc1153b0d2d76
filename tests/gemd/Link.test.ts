import { describe, expect, it } from 'vitest'
import {
    identityKey,
    identityKeysOf,
    isLink,
    linkFor,
    writableSortOrder
} from 'citrine-gemd'

describe('links', () => {
    it('prefers the platform scope', () => {
        expect(linkFor({ custom: 'c1', id: 'abc' })).toEqual({ type: 'link_by_uid', scope: 'id', id: 'abc' })
    })

    it('falls back to the first uid', () => {
        expect(linkFor({ custom: 'c1', other: 'o1' })).toEqual({ type: 'link_by_uid', scope: 'custom', id: 'c1' })
        expect(linkFor({})).toBeUndefined()
    })

    it('formats identity keys', () => {
        expect(identityKey('id', 'abc')).toBe('id::abc')
        expect(identityKeysOf({ id: 'abc', custom: 'c1' })).toEqual(['id::abc', 'custom::c1'])
    })

    it('recognizes links', () => {
        expect(isLink({ type: 'link_by_uid', scope: 'id', id: 'x' })).toBe(true)
        expect(isLink({ type: 'material_spec', scope: 'id', id: 'x' })).toBe(false)
        expect(isLink(null)).toBe(false)
    })
})

describe('write order', () => {
    it('ranks templates before specs before runs', () => {
        expect(writableSortOrder('property_template')).toBe(0)
        expect(writableSortOrder('process_spec')).toBe(6)
        expect(writableSortOrder('ingredient_run')).toBe(13)
    })

    it('ranks unknown types last', () => {
        expect(writableSortOrder('dataset')).toBe(14)
    })
})
