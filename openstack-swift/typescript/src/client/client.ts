/**
 * Swift client
 * @module openstack-swift-client/client/client
 */

import type { NormalizedSwiftConfig } from '../config/index.js';
import { Account } from '../entities/index.js';
import type { Logger } from '../observability/index.js';
import type { HttpTransport } from '../transport/index.js';

/**
 * Entry point to one Swift account.
 *
 * Owns the transport; call `close()` when done.
 */
export class SwiftClient {
  readonly account: Account;
  private closed = false;

  constructor(
    readonly config: NormalizedSwiftConfig,
    private readonly transport: HttpTransport,
    logger: Logger
  ) {
    this.account = new Account({ storageUrl: config.storageUrl, transport, logger });
  }

  /**
   * Releases the transport. Further calls are no-ops.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.transport.close();
  }
}
