import assert from 'node:assert/strict';
import test from 'node:test';
import type { Logger } from './logger.js';
import { ViewModelRegistry, buildInvoiceViewModel, createViewModelRegistry } from './view-model.js';

test('buildInvoiceViewModel computes line totals from whole quantities', () => {
  const model = buildInvoiceViewModel({
    invoiceNumber: 42,
    date: '2024-03-01',
    customer: {
      companyName: 'Acme',
      address: { street: '1 Main St', city: 'Springfield', state: 'IL', zipCode: '62701' },
    },
    items: [
      { description: 'Widget', unitPrice: '9.5', quantity: 3.7 },
      'not an item',
      { unitPrice: 'abc', quantity: 2 },
    ],
  });

  assert.deepEqual(model, {
    invoiceNumber: '42',
    date: '2024-03-01',
    customerName: 'Acme',
    customerAddress: '1 Main St, Springfield, IL 62701',
    items: [
      { description: 'Widget', quantity: 3, unitPrice: 9.5, lineTotal: 28.5 },
      { description: '', quantity: 2, unitPrice: 0, lineTotal: 0 },
    ],
    totalAmount: 28.5,
    showDiscountMessage: false,
  });
});

test('buildInvoiceViewModel fills in missing values', () => {
  const model = buildInvoiceViewModel({ items: [{ unitPrice: 1001, quantity: 1 }] });

  assert.equal(model.invoiceNumber, 'N/A');
  assert.equal(model.customerName, '');
  assert.equal(model.customerAddress, '');
  assert.equal(model.showDiscountMessage, true);
});

test('ViewModelRegistry falls back to raw data for unknown builders', () => {
  const warnings: string[] = [];
  const logger: Logger = {
    debug() {},
    info() {},
    warn(message) {
      warnings.push(message);
    },
    error() {},
    child: () => logger,
  };
  const registry = new ViewModelRegistry(logger);
  registry.register('Title', data => ({ title: String(data.name).toUpperCase() }));
  const data = { name: 'report' };

  assert.equal(registry.build(undefined, data), data);
  assert.deepEqual(registry.build('title', data), { title: 'REPORT' });
  assert.equal(registry.build('receipt', data), data);
  assert.deepEqual(warnings, ['No view model builder registered for "receipt", using raw data']);
  assert.equal(createViewModelRegistry().has('INVOICE'), true);
});
