import { argumentDeclaration } from '../encoding/prettyPrint.js';
import { methodValueType, parseMethodSignature } from '../signature/methodSignature.js';

export type MethodDescription = {
  /** Selector name, e.g. `initWithFrame:style:` */
  name: string;
  typeEncoding: string;
  isClassMethod: boolean;
};

/** `self` and `_cmd` lead every method's argument list. */
const IMPLICIT_ARGUMENTS = 2;

/**
 * Renders the method the way a class header declares it:
 * `- (void)setTitle:(NSString *)arg0;`
 */
export function methodHeader(method: MethodDescription): string {
  const prefix = method.isClassMethod ? '+' : '-';
  const signature = parseMethodSignature(method.typeEncoding);
  const returnType = argumentDeclaration(methodValueType(signature.returnValue));

  const labels = method.name.split(':');
  if (labels.length === 1) return `${prefix} (${returnType})${method.name};`;
  labels.pop();

  const argumentTypes = signature.arguments
    .slice(IMPLICIT_ARGUMENTS)
    .map((value) => argumentDeclaration(methodValueType(value)));
  const parts = labels.map((label, i) => `${label}:(${argumentTypes[i] ?? 'id'})arg${i}`);
  return `${prefix} (${returnType})${parts.join(' ')};`;
}
