import type { Attribute, Entity, Reference, TemplatedAttribute } from './types'

function attributeTemplates(attributes: ReadonlyArray<Attribute>): Reference[] {
    const out: Reference[] = []
    for (const attribute of attributes) {
        if (attribute.template) out.push(attribute.template)
    }
    return out
}

function templatedAttributes(attributes: ReadonlyArray<TemplatedAttribute>): Reference[] {
    return attributes.map(attribute => attribute.template)
}

function present(...refs: Array<Reference | undefined>): Reference[] {
    const out: Reference[] = []
    for (const ref of refs) {
        if (ref) out.push(ref)
    }
    return out
}

/**
 * Objects an entity points at directly. Back-references are not dependencies.
 */
export function shallowDependencies(entity: Entity): Reference[] {
    switch (entity.type) {
        case 'property_template':
        case 'condition_template':
        case 'parameter_template':
            return []
        case 'material_template':
            return templatedAttributes(entity.properties)
        case 'measurement_template':
            return [
                ...templatedAttributes(entity.properties),
                ...templatedAttributes(entity.conditions),
                ...templatedAttributes(entity.parameters)
            ]
        case 'process_template':
            return [
                ...templatedAttributes(entity.conditions),
                ...templatedAttributes(entity.parameters)
            ]
        case 'process_spec':
            return [
                ...attributeTemplates(entity.conditions),
                ...attributeTemplates(entity.parameters),
                ...present(entity.template)
            ]
        case 'material_spec': {
            const out: Reference[] = []
            for (const entry of entity.properties) {
                out.push(...attributeTemplates([entry.property]), ...attributeTemplates(entry.conditions))
            }
            return [...out, ...present(entity.template, entity.process)]
        }
        case 'measurement_spec':
            return [
                ...attributeTemplates(entity.conditions),
                ...attributeTemplates(entity.parameters),
                ...present(entity.template)
            ]
        case 'ingredient_spec':
            return present(entity.material, entity.process)
        case 'process_run':
            return [
                ...attributeTemplates(entity.conditions),
                ...attributeTemplates(entity.parameters),
                ...present(entity.spec)
            ]
        case 'material_run':
            return present(entity.spec, entity.process)
        case 'measurement_run':
            return [
                ...attributeTemplates(entity.properties),
                ...attributeTemplates(entity.conditions),
                ...attributeTemplates(entity.parameters),
                ...present(entity.spec, entity.material)
            ]
        case 'ingredient_run':
            return present(entity.spec, entity.material, entity.process)
    }
}

/**
 * Objects reachable from an entity but not depended on (process ingredients,
 * material measurements).
 */
export function backReferences(entity: Entity): Reference[] {
    switch (entity.type) {
        case 'process_spec':
        case 'process_run':
            return entity.ingredients ?? []
        case 'material_run':
            return entity.measurements ?? []
        default:
            return []
    }
}
