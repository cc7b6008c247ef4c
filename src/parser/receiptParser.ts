import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Consumer, FiscalDocument, Issuer, LineItem, Payment } from '../models/receipt';
import { ParseError, ValidationError } from '../errors';
import {
  ACCESS_KEY_LENGTH,
  collapseWhitespace,
  digitsOnly,
  extractCnpj,
  normalizeAddress,
  parseBrazilianNumber,
  roundMoney,
  toIsoIssueDate,
} from './normalize';

interface TextSource {
  length: number;
  text(): string;
}

function textIfPresent(selection: TextSource): string | undefined {
  if (selection.length === 0) return undefined;
  const text = collapseWhitespace(selection.text());
  return text.length > 0 ? text : undefined;
}

/**
 * Validates a fiscal access key. Whitespace between digit groups is accepted;
 * anything else must be exactly 44 digits.
 */
export function normalizeAccessKey(accessKey: string): string {
  const compact = accessKey.replace(/\s+/g, '');
  if (!new RegExp(`^\\d{${ACCESS_KEY_LENGTH}}$`).test(compact)) {
    throw new ValidationError(`Access key must contain exactly ${ACCESS_KEY_LENGTH} numeric digits.`);
  }
  return compact;
}

export function isValidAccessKey(accessKey: string): boolean {
  try {
    normalizeAccessKey(accessKey);
    return true;
  } catch {
    return false;
  }
}

function parseAccessKey($: CheerioAPI): string {
  const tagged = textIfPresent($('span.chave').first());
  if (tagged) {
    const digits = digitsOnly(tagged);
    if (digits.length === ACCESS_KEY_LENGTH) return digits;
  }

  const bodyText = $('body').text();
  const match = bodyText.match(/(?<!\d)(?:\d[^\S\n]*){44}(?!\d)/);
  if (match) return digitsOnly(match[0]);

  throw new ParseError('access-key', 'Receipt markup does not contain an access key.');
}

function parseIssuer($: CheerioAPI): Issuer {
  let name: string | undefined;
  let cnpjText: string | undefined;
  const addressParts: string[] = [];

  const container = $('div.txtCenter').first();
  if (container.length > 0) {
    name = textIfPresent(container.find('#u20').first());
    container.find('div.text').each((_, node) => {
      const text = textIfPresent($(node));
      if (!text) return;
      if (text.toUpperCase().startsWith('CNPJ')) {
        cnpjText = text.slice(text.indexOf(':') + 1);
      } else {
        addressParts.push(text);
      }
    });
  } else {
    name = textIfPresent($('td.NFCCabecalho_SubTitulo').first());
    $('td.NFCCabecalho_SubTitulo1').each((_, node) => {
      const text = textIfPresent($(node));
      if (!text) return;
      if (cnpjText === undefined && text.toUpperCase().includes('CNPJ')) {
        cnpjText = text;
      } else if (cnpjText !== undefined && addressParts.length === 0) {
        addressParts.push(text);
      }
    });
  }

  if (!name) {
    throw new ParseError('header', 'Receipt header does not name the issuer.');
  }
  const cnpj = cnpjText !== undefined ? extractCnpj(cnpjText) : undefined;
  if (!cnpj) {
    throw new ParseError('header', 'Receipt header does not carry a valid CNPJ.');
  }

  const address = addressParts.map(normalizeAddress).filter((part) => part.length > 0).join(' - ');
  return { name, cnpj, ...(address ? { address } : {}) };
}

function requireNumber(text: string | undefined, field: string, sequence: number): number {
  const value = text !== undefined ? parseBrazilianNumber(text) : undefined;
  if (value === undefined) {
    throw new ParseError('items', `Item ${sequence} has no readable ${field}.`);
  }
  return value;
}

function labelledValue(text: string | undefined, label: RegExp): string | undefined {
  if (text === undefined) return undefined;
  const match = text.match(label);
  return match?.[1]?.trim();
}

function parseItems($: CheerioAPI): LineItem[] {
  let rows = $('tr[id^=Item]');
  if (rows.length === 0) rows = $('div[id^=Item]');
  if (rows.length === 0) {
    throw new ParseError('items', 'Receipt markup has no item table.');
  }

  const items: LineItem[] = [];
  rows.each((index, node) => {
    const row = $(node);
    const sequence = index + 1;
    const spanDescription = textIfPresent(row.find('span.txtTit').first());

    if (spanDescription) {
      const code = labelledValue(textIfPresent(row.find('span.RCod').first()), /C[oó]digo:?\s*([0-9]+)/i);
      const unit = labelledValue(textIfPresent(row.find('span.RUN').first()), /UN\s*:?\s*([A-Za-z0-9]+)/i);
      items.push({
        sequence,
        description: spanDescription,
        ...(code ? { code } : {}),
        quantity: requireNumber(
          labelledValue(textIfPresent(row.find('span.Rqtd').first()), /Qtde\.?\s*:?\s*([0-9.,]+)/i),
          'quantity',
          sequence,
        ),
        unit: unit ?? null,
        unitPrice: requireNumber(
          labelledValue(textIfPresent(row.find('span.RvlUnit').first()), /Vl\.\s*Unit\.?\s*:?\s*([0-9.,]+)/i),
          'unit price',
          sequence,
        ),
        totalPrice: requireNumber(textIfPresent(row.find('span.valor').first()), 'total price', sequence),
      });
      return;
    }

    const cells = row.find('td.NFCDetalhe_Item');
    if (cells.length < 6) {
      throw new ParseError('items', `Item ${sequence} is missing columns.`);
    }
    const cell = (position: number) => textIfPresent(cells.eq(position));
    const description = cell(1);
    if (!description) {
      throw new ParseError('items', `Item ${sequence} has no description.`);
    }
    const code = cell(0);
    items.push({
      sequence,
      description,
      ...(code ? { code } : {}),
      quantity: requireNumber(cell(2), 'quantity', sequence),
      unit: cell(3) ?? null,
      unitPrice: requireNumber(cell(4), 'unit price', sequence),
      totalPrice: requireNumber(cell(5), 'total price', sequence),
    });
  });

  return items;
}

interface Totals {
  totalValue?: number | undefined;
  taxes?: number | undefined;
  declaredItemCount?: number | undefined;
  payments: Payment[];
}

const NON_PAYMENT_LABELS = [/^Qtd/i, /^Forma de pagamento/i, /^Troco/i, /^Descontos?/i, /^Valor total/i];

function parseTotals($: CheerioAPI): Totals {
  const blocks = $('#totalNota > div');
  if (blocks.length === 0) {
    throw new ParseError('payments', 'Receipt markup has no totals and payment table.');
  }

  const totals: Totals = { payments: [] };
  blocks.each((_, node) => {
    const block = $(node);
    const label = textIfPresent(block.find('label').first());
    const amountText = textIfPresent(block.find('span.totalNumb').first());
    if (!label || amountText === undefined) return;

    if (/^Qtd/i.test(label)) {
      const count = Number.parseInt(digitsOnly(amountText), 10);
      if (Number.isFinite(count)) totals.declaredItemCount = count;
      return;
    }
    if (label.includes('Valor a pagar')) {
      totals.totalValue = parseBrazilianNumber(amountText);
      if (totals.totalValue === undefined) {
        throw new ParseError('payments', `Total value "${amountText}" is not a number.`);
      }
      return;
    }
    if (label.includes('Tributos')) {
      totals.taxes = parseBrazilianNumber(amountText);
      return;
    }
    if (NON_PAYMENT_LABELS.some((pattern) => pattern.test(label))) return;

    const amount = parseBrazilianNumber(amountText);
    if (amount === undefined) return;
    totals.payments.push({ method: label, amount });
  });

  return totals;
}

function parseGeneralInfo($: CheerioAPI): { number?: string; series?: string; issuedAtText?: string } {
  const header = $('h4')
    .filter((_, node) => $(node).text().toLowerCase().includes('informações gerais'))
    .first();
  if (header.length === 0) return {};

  const text = textIfPresent(header.nextAll('ul').first().find('li').first()) ?? textIfPresent(header.parent().find('li').first());
  if (!text) return {};

  const number = text.match(/Número:\s*([0-9]+)/)?.[1];
  const series = text.match(/Série:\s*([0-9]+)/)?.[1];
  const issuedAtText = text.match(/Emissão:\s*([^-]+)/)?.[1]?.trim();
  return {
    ...(number ? { number } : {}),
    ...(series ? { series } : {}),
    ...(issuedAtText ? { issuedAtText } : {}),
  };
}

function parseConsumer($: CheerioAPI): Consumer | undefined {
  let consumer: Consumer | undefined;
  $('div[data-role=collapsible]').each((_, node) => {
    if (consumer) return;
    const section = $(node);
    const title = textIfPresent(section.find('h4').first());
    if (!title || !title.includes('Consumidor')) return;

    const found: Consumer = {};
    section.find('li').each((__, li) => {
      const entry = $(li);
      const label = textIfPresent(entry.find('strong').first());
      const full = textIfPresent(entry);
      if (!label || !full) return;
      const value = full.replace(label, '').trim();
      const key = label.replace(/:$/, '').trim().toUpperCase();
      if (key === 'CPF' && value) found.cpf = value;
      if (key === 'NOME' && value) found.name = value;
    });
    consumer = found;
  });
  return consumer;
}

/**
 * Turns raw receipt markup into a frozen {@link FiscalDocument}.
 *
 * The access key is validated before the markup is read, and must match the
 * key printed on the receipt.
 */
export function parseReceipt(rawMarkup: string, accessKey: string): FiscalDocument {
  const requestedKey = normalizeAccessKey(accessKey);
  if (!rawMarkup.trim()) {
    throw new ParseError('document', 'Receipt markup is empty.');
  }

  const $ = cheerio.load(rawMarkup);
  const printedKey = parseAccessKey($);
  if (printedKey !== requestedKey) {
    throw new ParseError('access-key', `Receipt markup belongs to ${printedKey}, not ${requestedKey}.`);
  }

  const issuer = parseIssuer($);
  const items = parseItems($);
  const totals = parseTotals($);

  if (totals.totalValue === undefined) {
    throw new ParseError('payments', 'Receipt does not state the amount to pay.');
  }
  if (totals.payments.length === 0) {
    throw new ParseError('payments', 'Receipt does not list any payment method.');
  }
  if (totals.declaredItemCount !== undefined && totals.declaredItemCount !== items.length) {
    throw new ParseError(
      'items',
      `Receipt declares ${totals.declaredItemCount} items but the item table has ${items.length}.`,
    );
  }

  const info = parseGeneralInfo($);
  const consumer = parseConsumer($);
  const issuedAt = info.issuedAtText !== undefined ? toIsoIssueDate(info.issuedAtText) : undefined;
  const paidValue = roundMoney(totals.payments.reduce((sum, payment) => sum + payment.amount, 0));

  const document: FiscalDocument = {
    accessKey: requestedKey,
    issuer: Object.freeze(issuer),
    ...info,
    ...(issuedAt ? { issuedAt } : {}),
    ...(consumer ? { consumer: Object.freeze(consumer) } : {}),
    totalValue: totals.totalValue,
    paidValue,
    ...(totals.taxes !== undefined ? { taxes: totals.taxes } : {}),
    ...(totals.declaredItemCount !== undefined ? { declaredItemCount: totals.declaredItemCount } : {}),
    items: Object.freeze(items.map((item) => Object.freeze(item))),
    payments: Object.freeze(totals.payments.map((payment) => Object.freeze(payment))),
  };

  return Object.freeze(document);
}
