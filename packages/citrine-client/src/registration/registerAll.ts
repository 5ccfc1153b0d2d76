import { createBatcher } from 'citrine-batch'
import type { TypePriority } from 'citrine-batch'
import {
    CITRINE_SCOPE,
    createGemdGraphModel,
    flatten,
    fromWire,
    identityKeysOf,
    toWire
} from 'citrine-gemd'
import type { Entity, Uids } from 'citrine-gemd'
import { createId, createUuid } from 'citrine-shared'
import type { Logger } from 'citrine-shared'
import { invalidResponseError } from '../errors'
import type { RegisterAllOptions, RegistrationResult, RegistrationUpdate, Transport } from '../types'

export const DEFAULT_BATCH_SIZE = 50

export type RegisterAllDeps = {
    transport: Transport
    /** Batch endpoint, e.g. `teams/{team}/datasets/{dataset}/storables/batch`. */
    path: string
    logger?: Logger
    batchSize?: number
    priority?: TypePriority
    createUid?: () => string
    createScope?: () => string
}

function withoutScope(uids: Uids, scope: string | undefined): Uids {
    if (scope === undefined) return { ...uids }
    return Object.fromEntries(Object.entries(uids).filter(([key]) => key !== scope))
}

function decodeBuilt(data: unknown, context: { path: string; at: string }): Entity {
    try {
        return fromWire(data)
    } catch (error) {
        throw invalidResponseError({
            path: context.path,
            message: `${context.at} is not a GEMD entity`,
            cause: error
        })
    }
}

/**
 * Registers `models` (and, with `includeNested`, everything they reach) in
 * batches that are submitted one after another. Caller objects are never
 * touched: identity the server settles on comes back as `updates`, to be
 * applied with `applyRegistrationUpdates`.
 *
 * A dry run batches by dependency so that each batch validates on its own,
 * and identifies new entities under a throwaway scope that is stripped from
 * everything returned.
 */
export async function registerAll(
    models: Iterable<Entity>,
    deps: RegisterAllDeps,
    options: RegisterAllOptions = {}
): Promise<RegistrationResult> {
    const dryRun = options.dryRun === true
    const batchSize = options.batchSize ?? deps.batchSize ?? DEFAULT_BATCH_SIZE
    const logger = deps.logger ?? {}
    const createUid = deps.createUid ?? createUuid

    const roots = Array.from(models)
    const candidates = options.includeNested ? flatten(roots) : roots

    const tempScope = dryRun ? (deps.createScope ?? (() => createId({ kind: 'scope' })))() : undefined
    const assignScope = tempScope ?? CITRINE_SCOPE

    // Everything reachable is serialized as a link, so it needs an identity too.
    const working = new Map<Entity, Uids>()
    for (const entity of flatten(roots)) {
        if (identityKeysOf(entity.uids).length) continue
        working.set(entity, { [assignScope]: createUid() })
    }
    const uidsOf = (entity: Entity): Uids => working.get(entity) ?? entity.uids

    const model = createGemdGraphModel({ uidsOf, priority: deps.priority })
    const batcher = createBatcher(dryRun ? 'by_dependency' : 'by_type', model)
    const batches = batcher.batch(candidates, batchSize)

    logger.info?.('registering entities', {
        count: candidates.length,
        batches: batches.length,
        dryRun
    })

    const registered: Entity[] = []
    const updates = new Map<Entity, RegistrationUpdate>()

    for (const [index, batch] of batches.entries()) {
        const owners = new Map<string, Entity>()
        for (const entity of batch) {
            for (const key of identityKeysOf(uidsOf(entity))) {
                if (!owners.has(key)) owners.set(key, entity)
            }
        }

        logger.debug?.('submitting batch', { index, size: batch.length, dryRun })
        const response = await deps.transport.submitBatch(
            deps.path,
            batch.map(entity => toWire(entity, { uidsOf })),
            { dry_run: dryRun }
        )

        for (const [position, data] of response.objects.entries()) {
            const built = decodeBuilt(data, {
                path: deps.path,
                at: `object ${position} of batch ${index + 1}/${batches.length}`
            })
            const original = identityKeysOf(built.uids)
                .map(key => owners.get(key))
                .find(found => found !== undefined)

            const uids = withoutScope(built.uids, tempScope)
            registered.push({ ...built, uids })

            if (original && !updates.has(original)) {
                updates.set(original, {
                    original,
                    uids: { ...withoutScope(uidsOf(original), tempScope), ...uids },
                    tags: [...built.tags]
                })
            }
        }
    }

    return { registered, updates: Array.from(updates.values()) }
}

/**
 * Merges each update's uids and tags onto its original entity.
 */
export function applyRegistrationUpdates(updates: Iterable<RegistrationUpdate>): void {
    for (const update of updates) {
        update.original.uids = { ...update.original.uids, ...update.uids }
        update.original.tags = [...update.tags]
    }
}
