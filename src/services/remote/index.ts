import type { ActiveSession, SyncProtocol } from '@root/types/library.types.js'
import type { RemoteClient } from '@root/types/remote.types.js'
import type { Config } from '@root/types/config.types.js'
import { GpodderClient } from '@services/remote/gpodder.client.js'
import { PodcastServiceClient } from '@services/remote/podcast-service.client.js'
import type { FastifyBaseLogger } from 'fastify'

export type RemoteClientFactory = (session: ActiveSession) => RemoteClient

/**
 * Builds the adapter for a session's protocol
 */
export function createRemoteClient(
  session: ActiveSession,
  config: Pick<Config, 'deviceId' | 'requestTimeoutMs'>,
  log: FastifyBaseLogger,
): RemoteClient {
  const options = {
    serverUrl: session.serverUrl,
    username: session.username,
    sessionToken: session.sessionToken,
    deviceId: config.deviceId,
    requestTimeoutMs: config.requestTimeoutMs,
  }
  switch (session.protocol) {
    case 'gpodder':
      return new GpodderClient(options, log)
    case 'podcast-service':
      return new PodcastServiceClient(options, log)
  }
}

/**
 * Exchanges credentials for a session token with the protocol's login call
 */
export function loginToServer(
  protocol: SyncProtocol,
  serverUrl: string,
  username: string,
  password: string,
  timeoutMs: number,
): Promise<string> {
  switch (protocol) {
    case 'gpodder':
      return GpodderClient.login(serverUrl, username, password, timeoutMs)
    case 'podcast-service':
      return PodcastServiceClient.login(serverUrl, username, password, timeoutMs)
  }
}
