// src/transport/factory.ts

import { createLogger } from '../logger.js';
import { ConfigError } from '../errors.js';
import type { Transport, TransportConfig } from '../types/window-types.js';
import { NodeSerialTransport } from './node-transports/node-serialport.js';
import { DEFAULT_TCP_PORT, NodeTcpTransport } from './node-transports/node-tcp-transport.js';

const logger = createLogger('factory');

/**
 * Creates a transport for the given configuration.
 *
 * @param config - `{ type: 'serial', path, ...serialOptions }` for RS232/RS485,
 *   `{ type: 'tcp', host, port?, ...tcpOptions }` for the LAN interface (port 23 by default)
 * @returns The transport instance, not yet connected.
 * @throws {ConfigError} If the type is unknown or the options are invalid.
 */
export function createTransport(config: TransportConfig): Transport {
  try {
    switch (config.type) {
      case 'serial': {
        const { type: _type, path, ...options } = config;
        if (!path) {
          throw new ConfigError('Missing "path" option for serial transport');
        }
        logger.debug(`Creating serial transport on ${path}`);
        return new NodeSerialTransport(path, options);
      }

      case 'tcp': {
        const { type: _type, host, port = DEFAULT_TCP_PORT, ...options } = config;
        if (!host) {
          throw new ConfigError('Missing "host" option for tcp transport');
        }
        if (!Number.isInteger(port) || port < 1 || port > 65535) {
          throw new ConfigError(`Invalid TCP port: ${port}`);
        }
        logger.debug(`Creating tcp transport to ${host}:${port}`);
        return new NodeTcpTransport(host, port, options);
      }

      default: {
        const unknown: { type?: unknown } = config;
        throw new ConfigError(`Unknown transport type: ${String(unknown.type)}`);
      }
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Failed to create transport: ${message}`);
    throw err;
  }
}
