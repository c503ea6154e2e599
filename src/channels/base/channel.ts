/**
 * Base Record Channel
 * Abstract base class for every sink a record can be delivered to.
 */

import Logger from '../../core/logger';
import { SinkError, errorMessage } from '../../core/errors';
import type { OutputRecord } from '../../types';

abstract class RecordChannel {
    name: string;
    logger: Logger;

    constructor(name: string) {
        this.name = name;
        this.logger = new Logger(`Channel:${name}`);
    }

    /**
     * Deliver one record. Resolves when the sink accepted it; rejects with
     * a SinkError otherwise.
     */
    async write(record: OutputRecord): Promise<void> {
        this.logger.debug(`Writing record (${record.text.length} chars)`);

        try {
            await this._writeImpl(record);
        } catch (error: unknown) {
            if (error instanceof SinkError) throw error;
            throw new SinkError(`${this.name} write failed: ${errorMessage(error)}`, { cause: error });
        }

        this.logger.info(`Record written to ${this.name}`);
    }

    /**
     * Implementation-specific write logic
     * Must be implemented by subclasses
     */
    abstract _writeImpl(record: OutputRecord): Promise<void>;
}

export default RecordChannel;
