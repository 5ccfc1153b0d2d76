import type { EntityType } from './types'

/**
 * Write order of GEMD types: anything an object references has a lower rank.
 */
export const WRITABLE_SORT_ORDER: Readonly<Record<EntityType, number>> = {
    property_template: 0,
    condition_template: 1,
    parameter_template: 2,
    material_template: 3,
    measurement_template: 4,
    process_template: 5,
    process_spec: 6,
    material_spec: 7,
    measurement_spec: 8,
    ingredient_spec: 9,
    process_run: 10,
    material_run: 11,
    measurement_run: 12,
    ingredient_run: 13
}

const UNKNOWN_RANK = Object.keys(WRITABLE_SORT_ORDER).length

export function isEntityType(value: string): value is EntityType {
    return Object.prototype.hasOwnProperty.call(WRITABLE_SORT_ORDER, value)
}

export function writableSortOrder(type: string): number {
    return isEntityType(type) ? WRITABLE_SORT_ORDER[type] : UNKNOWN_RANK
}
