import type {
  ServerConfiguration,
  SyncProtocol,
} from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { loginToServer } from '@services/remote/index.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface LoginRequest {
  protocol: SyncProtocol
  serverUrl: string
  username: string
  password: string
}

export type SessionInfo = Omit<ServerConfiguration, 'sessionToken'>

function toSessionInfo(config: ServerConfiguration): SessionInfo {
  const { sessionToken: _token, ...info } = config
  return info
}

/**
 * Logs in to and out of the sync server. Switching accounts or servers
 * resets the sync cursors so another account's history is not resumed.
 */
export class SessionService {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly db: DatabaseService,
    private readonly requestTimeoutMs: number,
  ) {
    this.log = createServiceLogger(baseLog, 'SESSION')
  }

  async getSession(): Promise<SessionInfo> {
    return toSessionInfo(await this.db.getServerConfiguration())
  }

  /**
   * @throws SyncError NoSession when the server rejects the credentials
   */
  async login(request: LoginRequest): Promise<SessionInfo> {
    const serverUrl = request.serverUrl.replace(/\/+$/, '')
    const sessionToken = await loginToServer(
      request.protocol,
      serverUrl,
      request.username,
      request.password,
      this.requestTimeoutMs,
    )

    const saved = await this.db.withTransaction(async (trx) => {
      const current = await this.db.getServerConfiguration(trx)
      const sameAccount =
        current.serverUrl === serverUrl &&
        current.protocol === request.protocol &&
        current.username === request.username
      if (!sameAccount) await this.db.resetSyncCursors(trx)

      return this.db.saveServerConfiguration(
        {
          serverUrl,
          protocol: request.protocol,
          username: request.username,
          sessionToken,
          isAuthenticated: true,
        },
        trx,
      )
    })

    this.log.info(
      { serverUrl, protocol: request.protocol, username: request.username },
      'Logged in to sync server',
    )
    return toSessionInfo(saved)
  }

  async logout(): Promise<SessionInfo> {
    const saved = await this.db.withTransaction(async (trx) => {
      await this.db.resetSyncCursors(trx)
      return this.db.saveServerConfiguration(
        { sessionToken: null, isAuthenticated: false },
        trx,
      )
    })
    this.log.info('Logged out of sync server')
    return toSessionInfo(saved)
  }
}
