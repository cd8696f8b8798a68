import { Effect } from "effect";
import { InputError } from "../errors/input.error.js";

type Delimiter = "," | ";" | "\t";

// One delimiter per file, taken from the first line. Semicolon and tab files may use decimal commas.
const detectDelimiter = (firstLine: string): Delimiter =>
  firstLine.includes(";") ? ";" : firstLine.includes("\t") ? "\t" : ",";

const DECIMAL_COMMA = /^[-+]?\d*,\d+$/;

const normalizeCell = (cell: string, delimiter: Delimiter): string =>
  delimiter !== "," && DECIMAL_COMMA.test(cell) ? cell.replace(",", ".") : cell;

const isNumericCell = (cell: string): boolean => cell.length > 0 && Number.isFinite(Number(cell));

// Picks the first column whose data cells are all numeric. A first row without any
// numeric cell is treated as a header.
export const parseLoadCsv = (text: string): Effect.Effect<readonly number[], InputError> => {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 0) {
    return Effect.fail(new InputError({ message: "Load file is empty" }));
  }

  const delimiter = detectDelimiter(lines[0]);
  const rows = lines.map((line) =>
    line.split(delimiter).map((cell) => normalizeCell(cell.trim(), delimiter))
  );

  const hasHeader = !rows[0].some(isNumericCell);
  const dataRows = hasHeader ? rows.slice(1) : rows;

  if (dataRows.length === 0) {
    return Effect.fail(new InputError({ message: "Load file has a header but no data rows" }));
  }

  const columnCount = Math.max(...dataRows.map((row) => row.length));
  for (let column = 0; column < columnCount; column++) {
    if (dataRows.every((row) => isNumericCell(row[column] ?? ""))) {
      return Effect.succeed(dataRows.map((row) => Number(row[column])));
    }
  }

  return Effect.fail(
    new InputError({ message: "No numeric column found in load file" })
  );
};
