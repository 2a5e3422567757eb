import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { BookingError, ProviderError, describeError } from '../domain/errors';
import { OFFER_PROVIDER, Offer, OfferProvider, OfferValidation } from '../domain/offers';
import type { OfferSearchCriteria } from '../domain/queries/search-offers';

/**
 * Every call to the provider goes through here: bounded by the configured
 * timeout, with every failure reported as a ProviderError.
 */
@Injectable()
export class OfferGateway {
  private readonly logger = new Logger(OfferGateway.name);

  constructor(
    @Inject(OFFER_PROVIDER) private readonly provider: OfferProvider,
    @Inject(APP_CONFIG) private readonly config: AppConfig
  ) {}

  validateOffer(offerId: string): Promise<OfferValidation> {
    return this.call(`validateOffer(${offerId})`, (signal) =>
      this.provider.validateOffer(offerId, signal)
    );
  }

  searchOffers(criteria: OfferSearchCriteria): Promise<Offer[]> {
    return this.call('searchOffers', (signal) => this.provider.searchOffers(criteria, signal));
  }

  private async call<T>(operation: string, invoke: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = this.config.providerTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject before aborting so the race settles on the timeout, not on the provider's abort error.
        reject(new ProviderError(`${operation} timed out after ${timeoutMs}ms`, { timedOut: true }));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([invoke(controller.signal), timeout]);
    } catch (error: unknown) {
      if (error instanceof ProviderError) {
        this.logger.warn(error.message);
        throw error;
      }
      if (error instanceof BookingError) {
        throw error;
      }

      this.logger.warn(`${operation} failed: ${describeError(error)}`);
      throw new ProviderError(`${operation} failed: ${describeError(error)}`, {}, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
