import { promises as fs } from 'fs';
import Papa from 'papaparse';

/**
 * Symbols from a list file: first column of each row (tab or comma separated),
 * skipping blank rows and '#' comments. Header-less; cleaning happens later.
 */
export function parseSymbolsText(text: string): string[] {
  const result = Papa.parse<string[]>(text, {
    comments: '#',
    skipEmptyLines: 'greedy',
    delimitersToGuess: ['\t', ','],
  });

  // A one-column file has no delimiter to detect
  const problems = result.errors.filter((error) => error.type !== 'Delimiter');
  if (problems.length > 0) {
    const first = problems[0];
    throw new Error(`Cannot read symbols file at row ${first.row ?? '?'}: ${first.message}`);
  }

  const symbols: string[] = [];
  for (const row of result.data) {
    const symbol = row[0]?.trim();
    if (symbol) {
      symbols.push(symbol);
    }
  }
  return symbols;
}

export async function loadSymbolsFile(filePath: string): Promise<string[]> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseSymbolsText(text);
}
