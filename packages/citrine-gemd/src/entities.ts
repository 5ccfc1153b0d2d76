import type {
    ConditionTemplate,
    Entity,
    IngredientRun,
    IngredientSpec,
    MaterialRun,
    MaterialSpec,
    MaterialTemplate,
    MeasurementRun,
    MeasurementSpec,
    MeasurementTemplate,
    ParameterTemplate,
    ProcessRun,
    ProcessSpec,
    ProcessTemplate,
    PropertyTemplate
} from './types'

type DefaultedKey = 'uids' | 'tags' | 'conditions' | 'parameters' | 'properties' | 'labels'

export type EntityInit<E extends Entity> =
    Omit<E, 'type' | DefaultedKey> & Partial<Pick<E, Extract<keyof E, DefaultedKey>>>

const base = (init: { uids?: Record<string, string>; tags?: string[] }) => ({
    uids: init.uids ?? {},
    tags: init.tags ?? []
})

export const propertyTemplate = (init: EntityInit<PropertyTemplate>): PropertyTemplate =>
    ({ ...init, ...base(init), type: 'property_template' })

export const conditionTemplate = (init: EntityInit<ConditionTemplate>): ConditionTemplate =>
    ({ ...init, ...base(init), type: 'condition_template' })

export const parameterTemplate = (init: EntityInit<ParameterTemplate>): ParameterTemplate =>
    ({ ...init, ...base(init), type: 'parameter_template' })

export const materialTemplate = (init: EntityInit<MaterialTemplate>): MaterialTemplate =>
    ({ ...init, ...base(init), type: 'material_template', properties: init.properties ?? [] })

export const measurementTemplate = (init: EntityInit<MeasurementTemplate>): MeasurementTemplate => ({
    ...init,
    ...base(init),
    type: 'measurement_template',
    properties: init.properties ?? [],
    conditions: init.conditions ?? [],
    parameters: init.parameters ?? []
})

export const processTemplate = (init: EntityInit<ProcessTemplate>): ProcessTemplate => ({
    ...init,
    ...base(init),
    type: 'process_template',
    conditions: init.conditions ?? [],
    parameters: init.parameters ?? []
})

export const processSpec = (init: EntityInit<ProcessSpec>): ProcessSpec => ({
    ...init,
    ...base(init),
    type: 'process_spec',
    conditions: init.conditions ?? [],
    parameters: init.parameters ?? []
})

export const materialSpec = (init: EntityInit<MaterialSpec>): MaterialSpec =>
    ({ ...init, ...base(init), type: 'material_spec', properties: init.properties ?? [] })

export const measurementSpec = (init: EntityInit<MeasurementSpec>): MeasurementSpec => ({
    ...init,
    ...base(init),
    type: 'measurement_spec',
    conditions: init.conditions ?? [],
    parameters: init.parameters ?? []
})

export const ingredientSpec = (init: EntityInit<IngredientSpec>): IngredientSpec =>
    ({ ...init, ...base(init), type: 'ingredient_spec', labels: init.labels ?? [] })

export const processRun = (init: EntityInit<ProcessRun>): ProcessRun => ({
    ...init,
    ...base(init),
    type: 'process_run',
    conditions: init.conditions ?? [],
    parameters: init.parameters ?? []
})

export const materialRun = (init: EntityInit<MaterialRun>): MaterialRun =>
    ({ ...init, ...base(init), type: 'material_run' })

export const measurementRun = (init: EntityInit<MeasurementRun>): MeasurementRun => ({
    ...init,
    ...base(init),
    type: 'measurement_run',
    properties: init.properties ?? [],
    conditions: init.conditions ?? [],
    parameters: init.parameters ?? []
})

export const ingredientRun = (init: EntityInit<IngredientRun>): IngredientRun =>
    ({ ...init, ...base(init), type: 'ingredient_run' })
