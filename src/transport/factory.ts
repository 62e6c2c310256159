// src/transport/factory.ts

import { EipConfigError } from '../errors.js';
import { defaultLogger } from '../logger.js';
import type { EipTransport, TransportOptions } from '../types/eip-types.js';

const logger = defaultLogger.createLogger('factory');

/**
 * Creates a new transport instance for the given options.
 *
 * @param options - Transport description:
 *   - `{ type: 'tcp', host, ...}`: TCP connection to a controller, see NodeTcpTransportOptions.
 *   - `{ type: 'emulator', emulator }`: in-process ControllerEmulator, no sockets.
 * @returns The transport instance (not yet connected).
 * @throws {EipConfigError} If the options are invalid.
 */
export async function createTransport(options: TransportOptions): Promise<EipTransport> {
  try {
    switch (options.type) {
      case 'tcp': {
        if (!options.host) {
          throw new EipConfigError('Missing "host" option for tcp transport');
        }
        const { NodeTcpTransport } = await import('./node-transports/node-tcp-transport.js');
        logger.debug(`Creating NodeTcpTransport for ${options.host}`);
        return new NodeTcpTransport(options.host, {
          port: options.port,
          connectTimeout: options.connectTimeout,
          readTimeout: options.readTimeout,
          maxBufferSize: options.maxBufferSize,
        });
      }

      case 'emulator': {
        const { EmulatorTransport } = await import('./emulator-transport.js');
        logger.debug('Creating EmulatorTransport');
        return new EmulatorTransport(options.emulator);
      }
    }
  } catch (err: unknown) {
    logger.error(
      `Failed to create transport of type "${options.type}": ${err instanceof Error ? err.message : String(err)}`
    );
    throw err;
  }
}
