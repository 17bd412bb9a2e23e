import type { QueryResult, QuerySource, TabularResult } from '../../domain/ports/QuerySource.js';
import type { TransferError } from '../../domain/model/TransferError.js';
import { connectionError, errorMessage, queryError } from '../../domain/model/TransferError.js';
import type { TransferContext } from '../TransferContext.js';

/** Either the tabular result to transfer, or why there is none. */
export type OpenResultOutcome =
  | { readonly ok: true; readonly result: TabularResult }
  | { readonly ok: false; readonly error: TransferError };

/** Use case: connect, execute the query and check that it produced rows (CONNECT → EXECUTE → VALIDATE). */
export class OpenResult {
  constructor(private readonly ctx: TransferContext) {}

  execute(source: QuerySource): OpenResultOutcome {
    this.ctx.transitionTo('CONNECT');
    try {
      source.connect();
    } catch (error) {
      return { ok: false, error: connectionError(errorMessage(error)) };
    }

    this.ctx.transitionTo('EXECUTE');
    let result: QueryResult;
    try {
      result = source.execute(this.ctx.config.query);
    } catch (error) {
      return { ok: false, error: queryError(errorMessage(error)) };
    }

    this.ctx.transitionTo('VALIDATE');
    if (result.kind !== 'tuples') {
      return { ok: false, error: queryError(result.commandTag) };
    }

    return { ok: true, result };
  }
}
