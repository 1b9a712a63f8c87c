import path from 'path';
import sourcesJson from '../policy-packs/vr-va-br-2025-v1/sources.json';
import { SOURCE_KEYS } from '@shared/constants';
import type { Dataset } from '@core/dataset';
import type { LedgerSources } from '@core/engine';
import { sourcesConfigSchema } from '@core/policy-pack';
import { ds, utc, writeSheet } from './helpers';

/**
 * A May 2025 scenario: one director, one intern, a vacation, two
 * terminations, an admission in April and a non-numeric identifier.
 */
export function sampleSources(): Partial<LedgerSources> {
  return {
    roster: ds(
      ['Matrícula', 'EMPRESA', 'TITULO DO CARGO', 'DESC. SITUACAO', 'Sindicato'],
      [
        [101, '1410', 'ANALISTA', 'Trabalhando', 'SINDPD SP - SIND.TRAB.EM PROC DADOS'],
        [102, '1410', 'DIRETOR ADMINISTRATIVO', 'Trabalhando', 'SINDPD SP'],
        [103, '1410', 'ESTAGIARIO', 'Trabalhando', 'SINDPD RJ'],
        [104, '1410', 'TECNICO', 'Trabalhando', 'SINDPPD RS'],
        [105, '1410', 'ANALISTA', 'Trabalhando', 'SITEPD PR'],
        ['abc', '1410', 'ANALISTA', 'Trabalhando', 'SINDPD SP'],
        [106, '1410', 'ANALISTA', 'Trabalhando', 'SINDPD RJ'],
      ],
    ),
    interns: ds(['MATRICULA'], [[103]]),
    vacation: ds(['MATRICULA', 'DIAS DE FÉRIAS'], [[104, 5]]),
    termination: ds(
      ['MATRICULA', 'DATA DEMISSÃO', 'COMUNICADO DE DESLIGAMENTO'],
      [
        [105, '2025-05-10', 'OK'],
        [106, utc(2025, 5, 20), null],
      ],
    ),
    admission: ds(['Cadastro', 'Admissão'], [[101, '2025-04-01']]),
    workingDays: ds(
      ['SINDICATO', 'DIAS'],
      [
        ['SINDPD SP', 22],
        ['SINDPD RJ', 21],
        ['SINDPPD RS', 21],
        ['SITEPD PR', 22],
      ],
    ),
    regionValues: ds(
      ['ESTADO', 'VALOR'],
      [
        ['São Paulo', 37.5],
        ['Rio de Janeiro', 35],
        ['Rio Grande do Sul', 35],
        ['Paraná', 35],
      ],
    ),
  };
}

export const sourcesConfig = sourcesConfigSchema.parse(sourcesJson);

function sheetRows(dataset: Dataset) {
  return [dataset.columns, ...dataset.rows.map((row) => dataset.columns.map((c) => row[c] ?? null))];
}

/** Writes the sample scenario as xlsx files under `dir`, skipping `omit`. */
export async function writeSampleData(dir: string, omit: string[] = []): Promise<void> {
  const sources = sampleSources();
  for (const key of SOURCE_KEYS) {
    const dataset = sources[key];
    if (!dataset || omit.includes(key)) continue;
    await writeSheet(path.join(dir, sourcesConfig.files[key]), sheetRows(dataset));
  }
}
