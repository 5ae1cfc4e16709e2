import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SEARCH_PROVIDER } from './interfaces/search-provider.interface';
import type {
  SearchProvider,
  SearchResultItem,
} from './interfaces/search-provider.interface';
import {
  buildSignalQueries,
  SIGNAL_TOPICS,
  SignalBundle,
  SignalTopic,
} from './signal-topics';
import { SearchError, SignalError } from '../common/errors/upstream.errors';
import { err, errorMessage, ok, Result } from '../common/result';

@Injectable()
export class MarketSignalsService {
  private readonly logger = new Logger(MarketSignalsService.name);

  constructor(
    @Inject(SEARCH_PROVIDER) private readonly provider: SearchProvider,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Issues the three topic queries. A failed search leaves its topic empty.
   * A fatal search error (e.g. a rejected credential) or a failure that is not
   * a search error fails the whole gather.
   */
  async gather(
    domain: string,
    apiKey: string,
  ): Promise<Result<SignalBundle, SignalError>> {
    if (domain.trim().length === 0) {
      return err(new SignalError('Domain must not be empty'));
    }

    const maxResults = this.configService.get<number>('SIGNAL_MAX_RESULTS', 3);
    const queries = buildSignalQueries(domain);

    const settled = await Promise.allSettled(
      SIGNAL_TOPICS.map((topic) =>
        this.provider.search(queries[topic], apiKey, { maxResults }),
      ),
    );

    const bundle: SignalBundle = {
      [SignalTopic.FUNDING]: [],
      [SignalTopic.HIRING]: [],
      [SignalTopic.TECH_STACK]: [],
    };

    for (const [index, outcome] of settled.entries()) {
      const topic = SIGNAL_TOPICS[index];
      if (outcome.status === 'fulfilled') {
        bundle[topic] = outcome.value;
        continue;
      }

      const reason: unknown = outcome.reason;
      if (!(reason instanceof SearchError)) {
        this.logger.error(
          `Signal topic "${topic}" raised an unexpected error for ${domain}: ${errorMessage(reason)}`,
        );
        return err(new SignalError(`Unexpected search failure: ${errorMessage(reason)}`));
      }
      if (reason.fatal) {
        this.logger.warn(
          `Signal gathering aborted for ${domain}: ${reason.message}`,
        );
        return err(
          new SignalError(reason.message, {
            status: reason.status,
            timedOut: reason.timedOut,
          }),
        );
      }

      this.logger.warn(
        `Signal topic "${topic}" failed for ${domain}, leaving it empty: ${reason.message}`,
      );
    }

    return ok(bundle);
  }
}

export type { SignalBundle, SearchResultItem };
