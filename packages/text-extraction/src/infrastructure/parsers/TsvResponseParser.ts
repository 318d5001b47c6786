import { InfrastructureError, Result, err, ok } from "@ocr-structure/types";

const REQUIRED_COLUMNS = [
  "level",
  "left",
  "top",
  "width",
  "height",
  "conf",
  "text",
] as const;

type Column = (typeof REQUIRED_COLUMNS)[number];

const WORD_LEVEL = "5";

export type TokenPayload = {
  text: string | undefined;
  confidence: number | undefined;
  x: number | undefined;
  y: number | undefined;
  width: number | undefined;
  height: number | undefined;
};

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return Number(value);
}

/**
 * Parser for the engine's TSV output. Keeps word rows only and leaves value
 * checking to the token schema, so a short row surfaces as a malformed
 * token rather than being dropped here.
 */
export class TsvResponseParser {
  parse(tsv: string): Result<TokenPayload[], InfrastructureError> {
    const rows = tsv
      .split("\n")
      .map((row) => row.replace(/\r$/, ""))
      .filter((row) => row.length > 0);

    if (rows.length === 0) {
      return ok([]);
    }

    const header = rows[0].split("\t");
    const indexes = new Map<Column, number>();
    for (const column of REQUIRED_COLUMNS) {
      const index = header.indexOf(column);
      if (index === -1) {
        return err(
          new InfrastructureError(
            `TSV output is missing the "${column}" column`,
            "TSV_PARSE_ERROR",
            { header },
          ),
        );
      }
      indexes.set(column, index);
    }

    const cell = (cells: string[], column: Column): string | undefined => {
      const index = indexes.get(column);
      return index === undefined ? undefined : cells[index];
    };

    return ok(
      rows
        .slice(1)
        .map((row) => row.split("\t"))
        .filter((cells) => cell(cells, "level") === WORD_LEVEL)
        .map((cells) => ({
          text: cell(cells, "text"),
          confidence: toNumber(cell(cells, "conf")),
          x: toNumber(cell(cells, "left")),
          y: toNumber(cell(cells, "top")),
          width: toNumber(cell(cells, "width")),
          height: toNumber(cell(cells, "height")),
        })),
    );
  }
}
