import { createSymbol, type Shape, type SymbolNode } from '../runtime.js';

export class SymbolAPI {}
