import { CreateInvoiceLineInput, NewInvoiceLine } from '../types/invoice.types';
import { ValidationError } from '../types/error.types';
import { roundMoney, roundQuantity, sumQuantities } from '../utils/quantity';

/**
 * Resolve the stored quantity of a line.
 *
 * Fabric is counted three ways, first match wins:
 * 1. detailed rolls: the sum of every piece measurement
 * 2. rolls_count x pieces_per_roll
 * 3. quantity as given
 *
 * The result is rounded to the quantity precision before it is checked, so
 * nothing that rounds to zero is stored.
 */
export function resolveLine(line: CreateInvoiceLineInput, position: number): NewInvoiceLine {
  const field = `items.${position}`;
  let quantity: number;

  if (line.detailedRolls && line.detailedRolls.length > 0) {
    quantity = sumQuantities(line.detailedRolls.flatMap((roll) => roll.pieces.map((piece) => piece.measurement)));
  } else if (line.rollsCount !== undefined) {
    if (line.piecesPerRoll === undefined) {
      throw new ValidationError(`pieces_per_roll is required with rolls_count for product ${line.productId}`, {
        field: `${field}.piecesPerRoll`,
      });
    }
    quantity = roundQuantity(line.rollsCount * line.piecesPerRoll);
  } else if (line.quantity !== undefined) {
    quantity = roundQuantity(line.quantity);
  } else {
    throw new ValidationError(`Quantity is required for product ${line.productId}`, {
      field: `${field}.quantity`,
    });
  }

  if (!(quantity > 0)) {
    throw new ValidationError(`Quantity for product ${line.productId} must be greater than 0`, {
      field: `${field}.quantity`,
      quantity,
    });
  }

  return {
    productId: line.productId,
    quantity,
    unit: line.unit,
    unitPrice: roundMoney(line.unitPrice),
    rollsCount: line.rollsCount ?? null,
    piecesPerRoll: line.piecesPerRoll ?? null,
    detailedRolls: line.detailedRolls && line.detailedRolls.length > 0 ? line.detailedRolls : null,
  };
}

export function lineTotal(line: Pick<NewInvoiceLine, 'quantity' | 'unitPrice'>): number {
  return roundMoney(line.quantity * line.unitPrice);
}
