/**
 * LineItem Aggregator
 * Reduces weighed line items into the fields an invoice record stores
 */
import type { ComputedLineItem, InvoiceAggregate, LineItemInput } from '@weighbill/shared';
import { dec, div, gt, mul, sum, zero } from '../money/decimal.js';
import { applyDiscount, finalAmount, netWeight, totalAmount } from './calculator.js';

export function computeLineItem(input: LineItemInput): ComputedLineItem {
  const grossWeight = dec(input.grossWeight);
  const cageWeight = dec(input.cageWeight);
  const unitPrice = dec(input.unitPrice);
  const discountPercentage = dec(input.discountPercentage);

  const cagesWeight = mul(input.cagesCount, cageWeight);
  const net = netWeight(grossWeight, cagesWeight);
  const total = totalAmount(net, unitPrice);

  return {
    grossWeight,
    cagesCount: input.cagesCount,
    cageWeight,
    unitPrice,
    discountPercentage,
    cagesWeight,
    netWeight: net,
    totalAmount: total,
    discountAmount: applyDiscount(total, discountPercentage),
    finalAmount: finalAmount(total, discountPercentage),
  };
}

/**
 * Sums weights and amounts. The unit price is weighted by net weight and
 * the discount by line amount; both are 0 when their weight sums to 0.
 * Nothing is rounded here.
 */
export function aggregateLineItems(items: readonly LineItemInput[]): InvoiceAggregate {
  const computed = items.map(computeLineItem);

  const netWeight = sum(computed.map((item) => item.netWeight));
  const totalAmount = sum(computed.map((item) => item.totalAmount));

  const weightedPrice = sum(computed.map((item) => mul(item.unitPrice, item.netWeight)));
  const weightedDiscount = sum(
    computed.map((item) => mul(item.discountPercentage, item.totalAmount))
  );

  return {
    grossWeight: sum(computed.map((item) => item.grossWeight)),
    cagesWeight: sum(computed.map((item) => item.cagesWeight)),
    cagesCount: computed.reduce((count, item) => count + item.cagesCount, 0),
    netWeight,
    unitPrice: gt(netWeight, 0) ? div(weightedPrice, netWeight) : zero(),
    discountPercentage: gt(totalAmount, 0) ? div(weightedDiscount, totalAmount) : zero(),
    totalAmount,
    discountAmount: sum(computed.map((item) => item.discountAmount)),
    finalAmount: sum(computed.map((item) => item.finalAmount)),
  };
}
