import type { TypeExpr } from '../parser/parserTypes.js';
import type { MethodRole, Receiver } from './declTypes.js';
import { isOwnerType } from './returnRules.js';

/**
 * Constructor / static / instance decision for one method.
 *
 * A borrow receiver always wins: `fn new(&mut self) -> Self` and builder
 * methods returning `Self` stay instance methods.
 */
export function classifyMethod(
  method: { name: string; receiver: Receiver; returnType: TypeExpr | null },
  owner: string,
): MethodRole {
  if (method.receiver !== 'none') return 'instanceMethod';
  if (method.name === 'new' || isOwnerType(method.returnType, owner)) return 'constructor';
  return 'staticFunction';
}
