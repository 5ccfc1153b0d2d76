import type { TypePriority } from 'citrine-batch'
import type { Entity, Identifier } from 'citrine-gemd'
import type { Logger } from 'citrine-shared'
import { batchDelete } from './deletion/batchDelete'
import { missingDatasetError } from './errors'
import { applyRegistrationUpdates, registerAll } from './registration/registerAll'
import type {
    BatchDeleteOptions,
    Clock,
    DeletionFailure,
    RegisterAllOptions,
    RegistrationResult,
    Transport
} from './types'

export type GemdCollectionConfig = Clock & {
    transport: Transport
    teamId: string
    datasetId?: string
    batchSize: number
    logger: Logger
    priority?: TypePriority
}

const segment = (value: string) => encodeURIComponent(value)

/**
 * GEMD objects of one team, optionally narrowed to one dataset.
 */
export class GemdCollection {
    constructor(private readonly config: GemdCollectionConfig) {}

    get teamId(): string {
        return this.config.teamId
    }

    get datasetId(): string | undefined {
        return this.config.datasetId
    }

    async registerAll(
        models: Iterable<Entity>,
        options: RegisterAllOptions & { applyUpdates?: boolean } = {}
    ): Promise<RegistrationResult> {
        const { datasetId } = this.config
        if (datasetId === undefined) throw missingDatasetError({ operation: 'registerAll' })

        const { applyUpdates, ...registerOptions } = options
        const result = await registerAll(models, {
            transport: this.config.transport,
            path: `teams/${segment(this.config.teamId)}/datasets/${segment(datasetId)}/storables/batch`,
            logger: this.config.logger,
            batchSize: this.config.batchSize,
            priority: this.config.priority
        }, registerOptions)

        if (applyUpdates) applyRegistrationUpdates(result.updates)
        return result
    }

    batchDelete(ids: Iterable<Identifier>, options: BatchDeleteOptions = {}): Promise<DeletionFailure[]> {
        const team = segment(this.config.teamId)
        return batchDelete(ids, {
            transport: this.config.transport,
            submitPath: `teams/${team}/gemd/async-batch-delete`,
            statusPath: `teams/${team}/execution/job-status`,
            logger: this.config.logger,
            now: this.config.now,
            sleep: this.config.sleep
        }, {
            ...options,
            datasetId: options.datasetId ?? this.config.datasetId
        })
    }
}
