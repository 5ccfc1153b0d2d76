import { childLogger, createNoopLogger, parseOrThrow } from 'citrine-shared'
import type { Logger } from 'citrine-shared'
import { GemdCollection } from './GemdCollection'
import { clientOptionsSchema } from './schemas/options'
import type { CitrineClientOptions } from './schemas/options'
import { HttpTransport } from './transport/HttpTransport'
import type { Clock, Transport } from './types'

export type CitrineClient = {
    readonly transport: Transport
    readonly logger: Logger
    gemd: (args: { teamId: string; datasetId?: string }) => GemdCollection
}

export function createCitrineClient(
    input: CitrineClientOptions & { transport?: Transport; clock?: Clock }
): CitrineClient {
    const options = parseOrThrow(clientOptionsSchema, input, { prefix: '[citrine] createCitrineClient: ' })
    const logger = options.logger ?? createNoopLogger()

    const transport = input.transport ?? new HttpTransport({
        baseURL: options.baseURL,
        headers: options.headers,
        fetchFn: options.fetchFn,
        retry: options.retry,
        logger
    })

    return {
        transport,
        logger,
        gemd: ({ teamId, datasetId }) => new GemdCollection({
            transport,
            teamId,
            datasetId,
            batchSize: options.batchSize,
            logger: childLogger(logger, { teamId, datasetId }),
            now: input.clock?.now,
            sleep: input.clock?.sleep
        })
    }
}
