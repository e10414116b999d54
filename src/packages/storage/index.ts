export { PlanilhaStore, PLANILHA_ID_PATTERN, dedupKeyOf, planilhaSchema } from './PlanilhaStore.js';
export type {
  AppendResult,
  PlanilhaDocument,
  PlanilhaStoreConfig,
  PlanilhaSummary,
} from './PlanilhaStore.js';
