import { ClientSession, Connection } from 'mongoose';

/**
 * Runs the flush of a unit of work as one atomic write where the store allows it
 */
export interface TransactionRunner {
  run(work: (session?: ClientSession) => Promise<void>): Promise<void>;
}

/**
 * Multi-document transaction on a mongoose connection (requires a replica set)
 */
export class MongooseTransactionRunner implements TransactionRunner {
  constructor(private readonly connection: Connection) {}

  async run(work: (session?: ClientSession) => Promise<void>): Promise<void> {
    await this.connection.transaction(async (session) => {
      await work(session);
    });
  }
}

/**
 * Flushes without a session, for standalone servers and in-memory stores
 */
export const directTransactionRunner: TransactionRunner = {
  run: (work) => work(),
};
