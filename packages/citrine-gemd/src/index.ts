export type {
    Attribute,
    AttributeTemplate,
    AttributeType,
    Bounds,
    Condition,
    ConditionTemplate,
    Entity,
    EntityOf,
    EntityType,
    Identifier,
    IngredientRun,
    IngredientSpec,
    LinkByUID,
    MaterialRun,
    MaterialSpec,
    MaterialTemplate,
    MeasurementRun,
    MeasurementSpec,
    MeasurementTemplate,
    ObjectTemplate,
    Parameter,
    ParameterTemplate,
    ProcessRun,
    ProcessSpec,
    ProcessTemplate,
    Property,
    PropertyAndConditions,
    PropertyTemplate,
    Reference,
    Run,
    Spec,
    TemplatedAttribute,
    Uids
} from './types'

export {
    CITRINE_SCOPE,
    createLink,
    identityKey,
    identityKeysOf,
    isEntity,
    isLink,
    linkFor,
    linkKey
} from './link'

export { WRITABLE_SORT_ORDER, isEntityType, writableSortOrder } from './sortOrder'
export { backReferences, shallowDependencies } from './dependencies'
export { flatten } from './flatten'
export type { FlattenOptions } from './flatten'
export { entitySchema, fromWire, linkSchema, toWire } from './wire'
export type { ToWireOptions, WireObject } from './wire'
export { createGemdGraphModel, describeEntity, entitiesEqual } from './graphModel'
export type { GemdGraphModelOptions } from './graphModel'

export * as gemd from './entities'
export type { EntityInit } from './entities'
