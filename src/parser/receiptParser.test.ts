import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { ParseError, ValidationError } from '../errors';
import { isValidAccessKey, normalizeAccessKey, parseReceipt } from './receiptParser';
import { normalizeAddress, parseBrazilianNumber, toIsoIssueDate } from './normalize';

const MODERN_KEY = '43240312345678000190650010000123451000123456';
const LEGACY_KEY = '43240498765432000110650020000456781000456789';

function fixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, '__fixtures__', name), 'utf8');
}

describe('normalizeAccessKey', () => {
  it('accepts 44 digits grouped by spaces', () => {
    expect(normalizeAccessKey('4324 0312 3456 7800 0190 6500 1000 0123 4510 0012 3456')).toBe(MODERN_KEY);
  });

  it('rejects keys with the wrong length or non-digits', () => {
    expect(() => normalizeAccessKey(MODERN_KEY.slice(1))).toThrow(ValidationError);
    expect(() => normalizeAccessKey(`${MODERN_KEY.slice(0, 43)}X`)).toThrow(ValidationError);
    expect(isValidAccessKey(`${MODERN_KEY}1`)).toBe(false);
    expect(isValidAccessKey(MODERN_KEY)).toBe(true);
  });
});

describe('parseReceipt', () => {
  it('extracts header, items, totals and payments from the span layout', () => {
    const document = parseReceipt(fixture('nfce-modern.html'), MODERN_KEY);

    expect(document.accessKey).toBe(MODERN_KEY);
    expect(document.issuer).toEqual({
      name: 'SUPERMERCADO BOA COMPRA LTDA',
      cnpj: '12.345.678/0001-90',
      address: 'RUA DAS FLORES, 100, CENTRO, PORTO ALEGRE, RS',
    });
    expect(document.number).toBe('12345');
    expect(document.series).toBe('1');
    expect(document.issuedAtText).toBe('05/03/2024 18:22:10');
    expect(document.issuedAt).toBe('2024-03-05T18:22:10');
    expect(document.consumer).toEqual({ cpf: '123.456.789-00', name: 'MARIA TESTE' });
    expect(document.totalValue).toBe(37.2);
    expect(document.paidValue).toBe(40);
    expect(document.taxes).toBe(5.12);
    expect(document.declaredItemCount).toBe(3);
    expect(document.payments).toEqual([
      { method: 'Cartão de Débito', amount: 30 },
      { method: 'Dinheiro', amount: 10 },
    ]);
    expect(document.items).toHaveLength(3);
    expect(document.items[0]).toEqual({
      sequence: 1,
      description: 'ARROZ BRANCO 5KG MARCA X',
      code: '7891234',
      quantity: 1,
      unit: 'UN',
      unitPrice: 24.9,
      totalPrice: 24.9,
    });
    expect(document.items[2]).toMatchObject({ sequence: 3, quantity: 1.235, unit: 'KG', totalPrice: 7.4 });
  });

  it('reads the legacy table layout', () => {
    const document = parseReceipt(fixture('nfce-legacy.html'), LEGACY_KEY);

    expect(document.issuer).toEqual({
      name: 'MERCADO CENTRAL ME',
      cnpj: '98.765.432/0001-10',
      address: 'AV BRASIL, 2000, SAO JOSE, CANOAS, RS',
    });
    expect(document.items.map((item) => item.description)).toEqual(['CAFE TORRADO 500G', 'LEITE INTEGRAL 1L']);
    expect(document.items[1]).toMatchObject({ code: '1002', quantity: 6, unitPrice: 4.85, totalPrice: 29.1 });
    expect(document.totalValue).toBe(60.1);
    expect(document.payments).toEqual([{ method: 'Cartão de Crédito', amount: 60.1 }]);
    expect(document.issuedAt).toBeUndefined();
  });

  it('returns a frozen document', () => {
    const document = parseReceipt(fixture('nfce-modern.html'), MODERN_KEY);
    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.items)).toBe(true);
    expect(Object.isFrozen(document.items[0])).toBe(true);
  });

  it('validates the key before looking at the markup', () => {
    expect(() => parseReceipt('', '123')).toThrow(ValidationError);
  });

  it('rejects markup that belongs to another receipt', () => {
    expect(() => parseReceipt(fixture('nfce-modern.html'), LEGACY_KEY)).toThrow(ParseError);
  });

  it('fails when the item table is missing', () => {
    const markup = fixture('nfce-modern.html').replace(/<table id="tabResult"[\s\S]*?<\/table>/, '');
    expect(() => parseReceipt(markup, MODERN_KEY)).toThrow(/no item table/);
  });

  it('fails when the issuer header is missing', () => {
    const markup = fixture('nfce-modern.html').replace('<div id="u20" class="txtTopo">SUPERMERCADO BOA COMPRA LTDA</div>', '');
    try {
      parseReceipt(markup, MODERN_KEY);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ section: 'header' });
    }
  });

  it('fails when an item has no total instead of inventing one', () => {
    const markup = fixture('nfce-modern.html').replace('<span class="valor">4,90</span>', '');
    expect(() => parseReceipt(markup, MODERN_KEY)).toThrow('Item 2 has no readable total price.');
  });

  it('fails when no payment method is listed', () => {
    const markup = fixture('nfce-modern.html')
      .replace('<div id="linhaTotal"><label class="tx">Cartão de Débito</label><span class="totalNumb">30,00</span></div>', '')
      .replace('<div id="linhaTotal"><label class="tx">Dinheiro</label><span class="totalNumb">10,00</span></div>', '');
    expect(() => parseReceipt(markup, MODERN_KEY)).toThrow('Receipt does not list any payment method.');
  });

  it('fails when the amount to pay is missing', () => {
    const markup = fixture('nfce-modern.html').replace('Valor a pagar R$:', 'Subtotal R$:');
    expect(() => parseReceipt(markup, MODERN_KEY)).toThrow(ParseError);
  });
});

describe('normalize helpers', () => {
  it('parses Brazilian number formatting', () => {
    expect(parseBrazilianNumber('1.234,56')).toBe(1234.56);
    expect(parseBrazilianNumber(' 0,385 ')).toBe(0.385);
    expect(parseBrazilianNumber('')).toBeUndefined();
    expect(parseBrazilianNumber('abc')).toBeUndefined();
  });

  it('drops empty address segments', () => {
    expect(normalizeAddress('RUA A ,  10 , ,  BAIRRO')).toBe('RUA A, 10, BAIRRO');
  });

  it('normalizes issue dates with the portal separators', () => {
    expect(toIsoIssueDate('05/03/2024 às 18h22')).toBe('2024-03-05T18:22:00');
    expect(toIsoIssueDate('05/03/2024')).toBe('2024-03-05');
    expect(toIsoIssueDate('sem data')).toBeUndefined();
  });
});
