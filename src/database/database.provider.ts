import { Provider, Logger, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import nano from 'nano';
import { DATABASE_CONNECTION } from './database.constants';
import type { WorkbookDocument } from '../table-store/table-store.types';

export async function createDatabaseConnection(
    configService: ConfigService,
): Promise<nano.DocumentScope<WorkbookDocument>> {
    const couchdbUrl = configService.get<string>('COUCHDB_URL');
    const dbName = configService.get<string>('COUCHDB_DATABASE');

    if (!couchdbUrl || !dbName) {
        // Refuse to start against an unknown store
        throw new Error('database.env_missing');
    }

    const logger = new Logger('DatabaseProvider');

    const connection = nano(couchdbUrl);

    try {
        const dbList = await connection.db.list();
        if (!dbList.includes(dbName)) {
            logger.log(`Database '${dbName}' not found. Creating it...`);
            await connection.db.create(dbName);
            logger.log(`Database '${dbName}' created successfully.`);
        }
    } catch (error) {
        logger.error('Failed to connect to or create CouchDB database.', error instanceof Error ? error.stack : String(error));
        throw new InternalServerErrorException({ key: 'database.connect_failed' });
    }

    return connection.db.use<WorkbookDocument>(dbName);
}

export const databaseProvider: Provider = {
    provide: DATABASE_CONNECTION,
    // async factory so ConfigService is ready
    useFactory: createDatabaseConnection,
    inject: [ConfigService],
};
