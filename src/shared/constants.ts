export const API_PREFIX = '/api';

export const ID_COLUMN = 'MATRICULA';
export const CATEGORY_COLUMN = 'Sindicato';

export const OUTPUT_SHEET_NAME = 'VR Mensal';

export const OUTPUT_HEADERS = [
  'Matricula',
  'Admissão',
  'Sindicato do Colaborador',
  'Competência',
  'Dias',
  'VALOR DIÁRIO VR',
  'TOTAL',
  'Custo empresa',
  'Desconto profissional',
  'OBS GERAL',
] as const;

export const SOURCE_KEYS = [
  'roster',
  'vacation',
  'termination',
  'admission',
  'regionValues',
  'workingDays',
  'leave',
  'interns',
  'apprentices',
  'overseas',
] as const;

export const EXCLUSION_CATEGORIES = [
  'interns',
  'apprentices',
  'leave',
  'overseas',
  'directors',
] as const;

export const ADJUSTMENT_KINDS = [
  'vacation',
  'termination_zeroed',
  'termination_prorated',
  'admission_prorated',
] as const;
