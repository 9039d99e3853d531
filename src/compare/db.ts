/**
 * @file db.ts
 * @description One matching run: a single record store shared by the
 * matching engine, the query layer and the match options.
 */

import { loadConfig, type Config } from '../core/config.js';
import { createLogger, type Logger } from '../core/log.js';
import { MatchingEngine } from './engine.js';
import { MatchOptionsStore } from './options.js';
import { QueryLayer } from './query.js';
import { RecordStore } from './store.js';

export interface CompareDbOptions {
  config?: Config;
  log?: Logger;
}

export class CompareDb {
  readonly store: RecordStore;
  readonly options: MatchOptionsStore;
  readonly query: QueryLayer;
  readonly engine: MatchingEngine;
  readonly log: Logger;

  constructor(opts: CompareDbOptions = {}) {
    const config = opts.config ?? loadConfig();
    this.log = opts.log ?? createLogger('bincorr', config);
    this.store = new RecordStore(this.log.child({ component: 'store' }));
    this.options = new MatchOptionsStore();
    this.query = new QueryLayer(this.store);
    this.engine = new MatchingEngine(this.store, this.options, {
      log: this.log.child({ component: 'engine' }),
      nameLimit: config.nameLimit,
    });
  }
}
