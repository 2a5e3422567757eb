import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { OfferSearchCriteria } from '../../domain/queries/search-offers';
import { StaticOfferProvider } from './static-offer-provider';

const CATALOG = join(__dirname, '../../../data/offers.json');

describe('StaticOfferProvider', () => {
  const signal = new AbortController().signal;
  let provider: StaticOfferProvider;

  beforeAll(() => {
    provider = StaticOfferProvider.fromFile(CATALOG);
  });

  const search = async (criteria: Partial<OfferSearchCriteria>) => {
    const offers = await provider.searchOffers(
      { destination: 'LIS', departDate: '2031-06-01', passengers: 1, ...criteria },
      signal
    );
    return offers.map((offer) => offer.offerId);
  };

  describe('validateOffer', () => {
    it('should quote a catalog offer', async () => {
      await expect(provider.validateOffer('FL-PAR-LIS-0601', signal)).resolves.toEqual({
        valid: true,
        price: 189.5,
        currency: 'EUR',
        capacity: 4
      });
    });

    it('should report an unknown offer as not valid', async () => {
      const validation = await provider.validateOffer('FL-NOWHERE', signal);

      expect(validation.valid).toBe(false);
      expect(validation.capacity).toBe(0);
    });

    it('should stop when the caller has already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(provider.validateOffer('FL-PAR-LIS-0601', controller.signal)).rejects.toMatchObject({
        name: 'AbortError'
      });
    });
  });

  describe('searchOffers', () => {
    it('should list matching offers cheapest first', async () => {
      expect(await search({ origin: 'PAR' })).toEqual(['FL-PAR-LIS-0601-B', 'FL-PAR-LIS-0601']);
    });

    it('should match destination case-insensitively and respect party size', async () => {
      expect(await search({ destination: 'lis', passengers: 3 })).toEqual([
        'FL-PAR-LIS-0601',
        'HT-LIS-ALFAMA'
      ]);
    });

    it('should filter by price ceiling', async () => {
      expect(await search({ maxPrice: 150 })).toEqual(['FL-PAR-LIS-0601-B']);
    });

    it('should filter by booking type', async () => {
      expect(await search({ destination: 'ROM', departDate: '2031-06-10', bookingType: 'hotel' })).toEqual([
        'HT-ROM-TREVI'
      ]);
    });

    it('should leave out sold-out offers', async () => {
      expect(await search({ destination: 'MAD', departDate: '2031-07-02' })).toEqual([]);
    });
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'offers-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should start with an empty catalog when the file is missing', async () => {
      const empty = StaticOfferProvider.fromFile(join(dir, 'missing.json'));

      expect((await empty.validateOffer('FL-PAR-LIS-0601', signal)).valid).toBe(false);
    });

    it('should refuse a catalog that is not an array', () => {
      const path = join(dir, 'offers.json');
      writeFileSync(path, JSON.stringify({ offers: [] }));

      expect(() => StaticOfferProvider.fromFile(path)).toThrow(`offer catalog ${path} must be a JSON array`);
    });

    it('should refuse an entry that is not a valid offer', () => {
      const path = join(dir, 'offers.json');
      writeFileSync(
        path,
        JSON.stringify([{ offerId: 'FL-X', destination: 'LIS', departDate: 'June', price: 10, capacity: 1 }])
      );

      expect(() => StaticOfferProvider.fromFile(path)).toThrow(`${path}[0] is not a valid offer`);
    });
  });
});
