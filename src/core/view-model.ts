// core/view-model.ts
// Named builders that shape raw request data into templated-view models

import type { DataTree } from '../types/index.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { isRecord } from './data-path.js';

export type ViewModelBuilder<T = unknown> = (data: Readonly<DataTree>) => T;

export class ViewModelRegistry {
  private readonly builders = new Map<string, ViewModelBuilder>();

  constructor(private readonly logger: Logger = silentLogger) {}

  register(name: string, builder: ViewModelBuilder): void {
    this.builders.set(name.toLowerCase(), builder);
  }

  has(name: string): boolean {
    return this.builders.has(name.toLowerCase());
  }

  /**
   * Build the model for `name`; without a builder the raw data is the model
   */
  build(name: string | undefined, data: Readonly<DataTree>): unknown {
    if (!name) return data;

    const builder = this.builders.get(name.toLowerCase());
    if (!builder) {
      this.logger.warn(`No view model builder registered for "${name}", using raw data`);
      return data;
    }
    return builder(data);
  }
}

// ============================================
// Invoice
// ============================================

export interface InvoiceItem {
  description: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export interface InvoiceViewModel {
  invoiceNumber: string;
  date: string;
  customerName: string;
  customerAddress: string;
  items: InvoiceItem[];
  totalAmount: number;
  showDiscountMessage: boolean;
}

const DISCOUNT_THRESHOLD = 1000;

function text(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : value === undefined || value === null ? fallback : String(value);
}

function amount(value: unknown): number {
  const num = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(num) ? num : 0;
}

export function buildInvoiceViewModel(data: Readonly<DataTree>): InvoiceViewModel {
  const customer = isRecord(data.customer) ? data.customer : {};
  const address = isRecord(customer.address) ? customer.address : null;

  const items: InvoiceItem[] = (Array.isArray(data.items) ? data.items : [])
    .filter(isRecord)
    .map(item => {
      const unitPrice = amount(item.unitPrice);
      const quantity = Math.trunc(amount(item.quantity));
      return {
        description: text(item.description),
        quantity,
        unitPrice,
        lineTotal: unitPrice * quantity,
      };
    });

  const totalAmount = items.reduce((sum, item) => sum + item.lineTotal, 0);

  return {
    invoiceNumber: text(data.invoiceNumber, 'N/A'),
    date: text(data.date),
    customerName: text(customer.companyName),
    customerAddress: address
      ? `${text(address.street)}, ${text(address.city)}, ${text(address.state)} ${text(address.zipCode)}`
      : '',
    items,
    totalAmount,
    showDiscountMessage: totalAmount > DISCOUNT_THRESHOLD,
  };
}

/**
 * Registry with the built-in builders
 */
export function createViewModelRegistry(logger: Logger = silentLogger): ViewModelRegistry {
  const registry = new ViewModelRegistry(logger);
  registry.register('invoice', buildInvoiceViewModel);
  return registry;
}
