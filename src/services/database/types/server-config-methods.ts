import type { ServerConfiguration } from '@root/types/library.types.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SERVER CONFIGURATION METHODS
    /**
     * Reads the server configuration singleton, creating it on first access
     */
    getServerConfiguration(trx?: Knex.Transaction): Promise<ServerConfiguration>

    saveServerConfiguration(
      updates: Partial<ServerConfiguration>,
      trx?: Knex.Transaction,
    ): Promise<ServerConfiguration>
  }
}
