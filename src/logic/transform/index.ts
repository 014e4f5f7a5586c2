export { toNNF } from './nnf.js';
export type { NNFFormula, NNFLiteral, NNFJunction, NegatedAtom } from './nnf.js';
export { distribute } from './distribute.js';
