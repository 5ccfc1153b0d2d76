import { createCodedError, formatZodErrorMessage, z } from 'citrine-shared'
import { isLink, linkFor } from './link'
import type {
    Attribute,
    Entity,
    LinkByUID,
    PropertyAndConditions,
    Reference,
    TemplatedAttribute,
    Uids
} from './types'

export type WireObject = Record<string, unknown>

export type ToWireOptions = {
    /** Uids to use for an entity and for everything it references. */
    uidsOf?: (entity: Entity) => Uids
    /**
     * What to emit for a referenced entity without uids: throw (default), or
     * a `{ type, name }` stand-in, which is only fit for comparisons.
     */
    unidentified?: 'throw' | 'describe'
}

function scrubUndefined(record: Record<string, unknown>): WireObject {
    const out: WireObject = {}
    for (const [key, value] of Object.entries(record)) {
        if (value !== undefined) out[key] = value
    }
    return out
}

/**
 * Serializes one entity for the platform. Nested entities are always
 * written as links, never embedded.
 */
export function toWire(entity: Entity, options: ToWireOptions = {}): WireObject {
    const uidsOf = options.uidsOf ?? ((e: Entity) => e.uids)

    const link = (ref: Reference): LinkByUID | WireObject => {
        if (isLink(ref)) return { type: ref.type, scope: ref.scope, id: ref.id }
        const found = linkFor(uidsOf(ref))
        if (found) return { type: found.type, scope: found.scope, id: found.id }
        if (options.unidentified === 'describe') return { type: ref.type, name: ref.name }
        throw createCodedError({
            code: 'UNIDENTIFIED_REFERENCE',
            message: `${entity.type} "${entity.name}" references ${ref.type} "${ref.name}", which has no uids`,
            details: { entity: entity.name, reference: ref.name }
        })
    }
    const optionalLink = (ref: Reference | undefined) => (ref ? link(ref) : undefined)

    const attribute = (attr: Attribute): WireObject => scrubUndefined({
        type: attr.type,
        name: attr.name,
        template: optionalLink(attr.template),
        value: attr.value,
        origin: attr.origin,
        notes: attr.notes
    })
    const attributes = (list: ReadonlyArray<Attribute>) => list.map(attribute)
    const templated = (list: ReadonlyArray<TemplatedAttribute>) =>
        list.map(entry => [link(entry.template), entry.bounds ?? null])
    const propertiesAndConditions = (list: ReadonlyArray<PropertyAndConditions>) =>
        list.map(entry => ({
            type: 'property_and_conditions',
            property: attribute(entry.property),
            conditions: attributes(entry.conditions)
        }))

    const base = {
        type: entity.type,
        uids: { ...uidsOf(entity) },
        tags: [...entity.tags],
        name: entity.name,
        notes: entity.notes
    }

    switch (entity.type) {
        case 'property_template':
        case 'condition_template':
        case 'parameter_template':
            return scrubUndefined({ ...base, description: entity.description, bounds: entity.bounds })
        case 'material_template':
            return scrubUndefined({
                ...base,
                description: entity.description,
                properties: templated(entity.properties)
            })
        case 'measurement_template':
            return scrubUndefined({
                ...base,
                description: entity.description,
                properties: templated(entity.properties),
                conditions: templated(entity.conditions),
                parameters: templated(entity.parameters)
            })
        case 'process_template':
            return scrubUndefined({
                ...base,
                description: entity.description,
                conditions: templated(entity.conditions),
                parameters: templated(entity.parameters)
            })
        case 'process_spec':
        case 'measurement_spec':
            return scrubUndefined({
                ...base,
                template: optionalLink(entity.template),
                conditions: attributes(entity.conditions),
                parameters: attributes(entity.parameters)
            })
        case 'material_spec':
            return scrubUndefined({
                ...base,
                template: optionalLink(entity.template),
                process: optionalLink(entity.process),
                properties: propertiesAndConditions(entity.properties)
            })
        case 'ingredient_spec':
            return scrubUndefined({
                ...base,
                process: optionalLink(entity.process),
                material: optionalLink(entity.material),
                labels: [...entity.labels]
            })
        case 'process_run':
            return scrubUndefined({
                ...base,
                spec: optionalLink(entity.spec),
                conditions: attributes(entity.conditions),
                parameters: attributes(entity.parameters)
            })
        case 'material_run':
            return scrubUndefined({
                ...base,
                spec: optionalLink(entity.spec),
                process: optionalLink(entity.process),
                sample_type: entity.sampleType
            })
        case 'measurement_run':
            return scrubUndefined({
                ...base,
                spec: optionalLink(entity.spec),
                material: optionalLink(entity.material),
                properties: attributes(entity.properties),
                conditions: attributes(entity.conditions),
                parameters: attributes(entity.parameters)
            })
        case 'ingredient_run':
            return scrubUndefined({
                ...base,
                spec: optionalLink(entity.spec),
                process: optionalLink(entity.process),
                material: optionalLink(entity.material)
            })
    }
}

// ============================================================================
// Decoding
// ============================================================================

export const linkSchema = z.object({
    type: z.literal('link_by_uid'),
    scope: z.string().min(1),
    id: z.string().min(1)
})

// The platform writes `null` for every unset field.
const absent = <S extends z.ZodType>(schema: S) => schema.nullish().transform(value => value ?? undefined)
const listOf = <S extends z.ZodType>(item: S) => z.array(item).nullish().transform(value => value ?? [])

const boundsSchema = z.record(z.string(), z.unknown())
const optionalLink = absent(linkSchema)
const optionalText = absent(z.string())

const attributeSchema = <K extends 'property' | 'condition' | 'parameter'>(type: K) => z.object({
    type: z.literal(type),
    name: z.string(),
    template: optionalLink,
    value: absent(z.unknown()),
    origin: optionalText,
    notes: optionalText
})

const propertySchema = attributeSchema('property')
const conditionSchema = attributeSchema('condition')
const parameterSchema = attributeSchema('parameter')

const templatedSchema = z.tuple([linkSchema, boundsSchema.nullish()])
    .transform(([template, bounds]): TemplatedAttribute => (bounds ? { template, bounds } : { template }))

const entityBase = <K extends Entity['type']>(type: K) => z.object({
    type: z.literal(type),
    uids: z.record(z.string(), z.string()).nullish().transform(value => value ?? {}),
    tags: listOf(z.string()),
    name: z.string(),
    notes: optionalText
})

const attributeTemplateSchema = <K extends 'property_template' | 'condition_template' | 'parameter_template'>(type: K) =>
    entityBase(type).extend({
        bounds: boundsSchema,
        description: optionalText
    })

export const entitySchema = z.discriminatedUnion('type', [
    attributeTemplateSchema('property_template'),
    attributeTemplateSchema('condition_template'),
    attributeTemplateSchema('parameter_template'),
    entityBase('material_template').extend({
        description: optionalText,
        properties: listOf(templatedSchema)
    }),
    entityBase('measurement_template').extend({
        description: optionalText,
        properties: listOf(templatedSchema),
        conditions: listOf(templatedSchema),
        parameters: listOf(templatedSchema)
    }),
    entityBase('process_template').extend({
        description: optionalText,
        conditions: listOf(templatedSchema),
        parameters: listOf(templatedSchema)
    }),
    entityBase('process_spec').extend({
        template: optionalLink,
        conditions: listOf(conditionSchema),
        parameters: listOf(parameterSchema)
    }),
    entityBase('material_spec').extend({
        template: optionalLink,
        process: optionalLink,
        properties: listOf(z.object({
            type: absent(z.literal('property_and_conditions')),
            property: propertySchema,
            conditions: listOf(conditionSchema)
        }))
    }),
    entityBase('measurement_spec').extend({
        template: optionalLink,
        conditions: listOf(conditionSchema),
        parameters: listOf(parameterSchema)
    }),
    entityBase('ingredient_spec').extend({
        process: optionalLink,
        material: optionalLink,
        labels: listOf(z.string())
    }),
    entityBase('process_run').extend({
        spec: optionalLink,
        conditions: listOf(conditionSchema),
        parameters: listOf(parameterSchema)
    }),
    entityBase('material_run').extend({
        spec: optionalLink,
        process: optionalLink,
        sample_type: optionalText
    }),
    entityBase('measurement_run').extend({
        spec: optionalLink,
        material: optionalLink,
        properties: listOf(propertySchema),
        conditions: listOf(conditionSchema),
        parameters: listOf(parameterSchema)
    }),
    entityBase('ingredient_run').extend({
        spec: optionalLink,
        process: optionalLink,
        material: optionalLink
    })
])

function dropUndefined<T extends object>(record: T): T {
    for (const key of Object.keys(record)) {
        if (Reflect.get(record, key) === undefined) Reflect.deleteProperty(record, key)
    }
    return record
}

/**
 * Builds an entity from its wire form. References come back as links and
 * fields the platform left `null` come back absent.
 */
export function fromWire(data: unknown): Entity {
    const result = entitySchema.safeParse(data)
    if (!result.success) {
        throw createCodedError({
            code: 'INVALID_ENTITY',
            message: formatZodErrorMessage(result.error, '[gemd] '),
            cause: result.error
        })
    }
    const parsed = dropUndefined(result.data)
    if (parsed.type !== 'material_run') return parsed
    const { sample_type, ...rest } = parsed
    return sample_type === undefined ? rest : { ...rest, sampleType: sample_type }
}
