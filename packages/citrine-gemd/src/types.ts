export type Uids = Record<string, string>

export type LinkByUID = Readonly<{
    type: 'link_by_uid'
    scope: string
    id: string
}>

export type Bounds = Record<string, unknown>

export type AttributeType = 'property' | 'condition' | 'parameter'

export type Attribute<K extends AttributeType = AttributeType> = {
    type: K
    name: string
    template?: Reference
    value?: unknown
    origin?: string
    notes?: string
}

export type Property = Attribute<'property'>
export type Condition = Attribute<'condition'>
export type Parameter = Attribute<'parameter'>

export type PropertyAndConditions = {
    type?: 'property_and_conditions'
    property: Property
    conditions: Condition[]
}

/** An attribute template reference on an object template, optionally narrowed. */
export type TemplatedAttribute = {
    template: Reference
    bounds?: Bounds
}

type EntityBase<K extends string> = {
    type: K
    uids: Uids
    tags: string[]
    name: string
    notes?: string
}

export type PropertyTemplate = EntityBase<'property_template'> & { bounds: Bounds; description?: string }
export type ConditionTemplate = EntityBase<'condition_template'> & { bounds: Bounds; description?: string }
export type ParameterTemplate = EntityBase<'parameter_template'> & { bounds: Bounds; description?: string }

export type MaterialTemplate = EntityBase<'material_template'> & {
    description?: string
    properties: TemplatedAttribute[]
}

export type MeasurementTemplate = EntityBase<'measurement_template'> & {
    description?: string
    properties: TemplatedAttribute[]
    conditions: TemplatedAttribute[]
    parameters: TemplatedAttribute[]
}

export type ProcessTemplate = EntityBase<'process_template'> & {
    description?: string
    conditions: TemplatedAttribute[]
    parameters: TemplatedAttribute[]
}

export type ProcessSpec = EntityBase<'process_spec'> & {
    template?: Reference
    conditions: Condition[]
    parameters: Parameter[]
    /** Back-reference, maintained by the caller; never serialized. */
    ingredients?: Reference[]
}

export type MaterialSpec = EntityBase<'material_spec'> & {
    template?: Reference
    process?: Reference
    properties: PropertyAndConditions[]
}

export type MeasurementSpec = EntityBase<'measurement_spec'> & {
    template?: Reference
    conditions: Condition[]
    parameters: Parameter[]
}

export type IngredientSpec = EntityBase<'ingredient_spec'> & {
    process?: Reference
    material?: Reference
    labels: string[]
}

export type ProcessRun = EntityBase<'process_run'> & {
    spec?: Reference
    conditions: Condition[]
    parameters: Parameter[]
    /** Back-reference, maintained by the caller; never serialized. */
    ingredients?: Reference[]
}

export type MaterialRun = EntityBase<'material_run'> & {
    spec?: Reference
    process?: Reference
    sampleType?: string
    /** Back-reference, maintained by the caller; never serialized. */
    measurements?: Reference[]
}

export type MeasurementRun = EntityBase<'measurement_run'> & {
    spec?: Reference
    material?: Reference
    properties: Property[]
    conditions: Condition[]
    parameters: Parameter[]
}

export type IngredientRun = EntityBase<'ingredient_run'> & {
    spec?: Reference
    process?: Reference
    material?: Reference
}

export type AttributeTemplate = PropertyTemplate | ConditionTemplate | ParameterTemplate
export type ObjectTemplate = MaterialTemplate | MeasurementTemplate | ProcessTemplate
export type Spec = ProcessSpec | MaterialSpec | MeasurementSpec | IngredientSpec
export type Run = ProcessRun | MaterialRun | MeasurementRun | IngredientRun

export type Entity = AttributeTemplate | ObjectTemplate | Spec | Run

export type EntityType = Entity['type']

export type EntityOf<K extends EntityType> = Extract<Entity, { type: K }>

export type Reference = Entity | LinkByUID

/** Anything `batchDelete` accepts as an identifier. */
export type Identifier = string | LinkByUID | Entity
