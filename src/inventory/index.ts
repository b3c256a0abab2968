export {
  StockLedger,
  type StockLevel,
  type StockReader,
  type StockLedgerOptions,
} from './stock-ledger.js';
