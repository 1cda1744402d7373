import { EventKind } from './types';
import { parseContent } from './content';

const HASH = 'ab'.repeat(32);

describe('parseContent', () => {
  it('parses a listing and keeps optional fields', () => {
    const result = parseContent(
      EventKind.PRODUCT_LISTING,
      JSON.stringify({ product_name: 'Lamp', description: 'Brass', price_satoshis: 42_000, category: 'home' })
    );
    expect(result).toEqual({
      success: true,
      value: {
        kind: EventKind.PRODUCT_LISTING,
        content: {
          product_name: 'Lamp',
          description: 'Brass',
          price_satoshis: 42_000,
          seller_collateral_satoshis: undefined,
          category: 'home',
          storage_link: undefined,
          shipping_info: undefined,
        },
      },
    });
  });

  it('rejects content that is not a JSON object', () => {
    expect(parseContent(EventKind.PRODUCT_LISTING, 'nope')).toEqual({
      success: false,
      error: 'InvalidContent',
      message: 'Content must be valid JSON',
    });
    expect(parseContent(EventKind.PRODUCT_LISTING, '[]')).toEqual({
      success: false,
      error: 'InvalidContent',
      message: 'Content must be a JSON object',
    });
  });

  it('reports the first missing field', () => {
    expect(parseContent(EventKind.PRODUCT_LISTING, JSON.stringify({ product_name: 'Lamp' }))).toEqual({
      success: false,
      error: 'InvalidContent',
      message: 'Missing required content field: description',
    });
  });

  it('rejects fractional amounts', () => {
    const result = parseContent(
      EventKind.BID_SUBMISSION,
      JSON.stringify({ product_ref: HASH, bid_amount_satoshis: 10.5, buyer_collateral_satoshis: 1 })
    );
    expect(result).toEqual({ success: false, error: 'InvalidContent', message: 'bid_amount_satoshis must be an integer' });
  });

  it('rejects product names over 100 characters', () => {
    const result = parseContent(
      EventKind.PRODUCT_LISTING,
      JSON.stringify({ product_name: 'x'.repeat(101), description: 'd', price_satoshis: 1 })
    );
    expect(result).toEqual({
      success: false,
      error: 'InvalidContent',
      message: 'product_name is longer than 100 characters',
    });
  });

  it('requires a Lightning invoice prefix on acceptances', () => {
    const result = parseContent(
      EventKind.BID_ACCEPTANCE,
      JSON.stringify({ bid_ref: HASH, ln_invoice: 'bitcoin:abc', invoice_amount_satoshis: 5 })
    );
    expect(result).toEqual({ success: false, error: 'InvalidContent', message: 'Invalid Lightning invoice format' });
  });

  it('requires a dispute reason for a non-received receipt', () => {
    const result = parseContent(
      EventKind.RECEIPT_CONFIRMATION,
      JSON.stringify({ payment_ref: HASH, status: 'damaged' })
    );
    expect(result).toEqual({
      success: false,
      error: 'InvalidContent',
      message: 'dispute_reason required for non-received status',
    });
  });

  it('keeps ratings inside 1..5', () => {
    const result = parseContent(
      EventKind.USER_REPUTATION_FEEDBACK,
      JSON.stringify({ transaction_ref: HASH, rated_pubkey: HASH, rating: 6 })
    );
    expect(result).toEqual({ success: false, error: 'InvalidContent', message: 'rating must be <= 5' });
  });

  it('only accepts websocket relay urls', () => {
    const bad = parseContent(EventKind.RELAY_REPUTATION_FEEDBACK, JSON.stringify({ relay_url: 'http://x', rating: 4 }));
    expect(bad).toEqual({ success: false, error: 'InvalidContent', message: 'relay_url has an invalid format' });

    const good = parseContent(
      EventKind.RELAY_REPUTATION_FEEDBACK,
      JSON.stringify({ relay_url: 'wss://relay.example', rating: 4 })
    );
    expect(good.success).toBe(true);
  });
});
