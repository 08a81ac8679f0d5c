/**
 * Base connection manager for storage adapters
 * Provides common connection management patterns
 */

import {
  ConnectionError,
  ReentrancyError,
  StorageError,
  toError
} from './error-handling';

/**
 * Base class for connection managers.
 *
 * Holds at most one open connection. Opening while one is held is a
 * programming error; once closed, the manager can open a fresh connection.
 */
export abstract class BaseConnectionManager<TConfig, TConnection> {
  protected connection?: TConnection;

  constructor(protected config: TConfig) {}

  /**
   * Open a new connection
   * @throws {ReentrancyError} If a connection is already open
   */
  protected open(): TConnection {
    if (this.connection) {
      throw new ReentrancyError(this.constructor.name);
    }

    try {
      this.connection = this.createConnection();
      return this.connection;
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new ConnectionError(
        `Failed to establish connection: ${toError(error).message}`,
        toError(error)
      );
    }
  }

  /**
   * Create a new connection
   * Must be implemented by subclasses
   */
  protected abstract createConnection(): TConnection;

  /**
   * Close the connection, if one is open
   */
  close(): void {
    const connection = this.connection;
    if (connection) {
      this.connection = undefined;
      this.closeConnection(connection);
    }
  }

  /**
   * Close the actual connection
   * Must be implemented by subclasses
   */
  protected abstract closeConnection(connection: TConnection): void;
}
