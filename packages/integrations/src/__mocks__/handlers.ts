import { http, HttpResponse, delay } from 'msw';

/**
 * MSW Handlers for External Service Mocks
 * Used in tests to mock the UPCitemdb barcode product API
 */

export const UPC_LOOKUP_URL = 'https://api.upcitemdb.com/prod/trial/lookup';

/**
 * Barcodes with a fixed response
 */
export const testFixtures = {
  barcodes: {
    /** Known product with a full item record */
    advil: '012345678905',
    /** Known product with an empty title */
    untitled: '036000291452',
    /** Valid lookup with no matching item */
    unknown: '0300450123',
  },
  advilItem: {
    ean: '0012345678905',
    title: 'Advil Ibuprofen Tablets 200mg, 100 Count',
    brand: 'Advil',
    description: 'Pain reliever and fever reducer',
    category: 'Health & Beauty > Health Care > Medicine & Drugs',
    images: ['https://images.example.com/advil.jpg'],
  },
} as const;

// =============================================================================
// UPCitemdb API Mocks
// =============================================================================

const upcItemDbHandlers = [
  http.get(UPC_LOOKUP_URL, ({ request }) => {
    const upc = new URL(request.url).searchParams.get('upc');

    if (upc === testFixtures.barcodes.advil) {
      return HttpResponse.json({ code: 'OK', total: 1, items: [testFixtures.advilItem] });
    }

    if (upc === testFixtures.barcodes.untitled) {
      return HttpResponse.json({
        code: 'OK',
        total: 1,
        items: [{ title: '', brand: 'Generic', category: '' }],
      });
    }

    return HttpResponse.json({ code: 'OK', total: 0, offset: 0, items: [] });
  }),
];

export const handlers = [...upcItemDbHandlers];

/**
 * Handler that answers every lookup with the given HTTP status
 */
export function createFailingHandler(status = 500) {
  return http.get(UPC_LOOKUP_URL, () =>
    HttpResponse.json({ code: 'SERVER_ERR', message: 'Internal error' }, { status })
  );
}

/**
 * Handler that answers after the given delay
 */
export function createSlowHandler(delayMs: number) {
  return http.get(UPC_LOOKUP_URL, async () => {
    await delay(delayMs);
    return HttpResponse.json({ code: 'OK', total: 1, items: [testFixtures.advilItem] });
  });
}

/**
 * Handler that answers the rate-limit status the trial endpoint uses
 */
export function createRateLimitedHandler() {
  return http.get(UPC_LOOKUP_URL, () =>
    HttpResponse.json({ code: 'TOO_FAST', message: 'The API rate limit was exceeded' }, { status: 429 })
  );
}
