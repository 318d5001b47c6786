import { Result, ok, err, ValidationError } from "@ocr-structure/types";
import languageTable from "../../../data/languages.json";

export type LanguageEntry = {
  code: string;
  name: string;
};

/**
 * Value object for an engine language code such as `eng` or a combination
 * such as `eng+fra`.
 */
export class LanguageCode {
  private constructor(private readonly value: string) {}

  private static readonly NAMES: ReadonlyMap<string, string> = new Map(
    languageTable.map((entry): [string, string] => [entry.code, entry.name]),
  );

  /**
   * Creates a LanguageCode; every `+`-separated part must be a known code.
   */
  static create(code: string): Result<LanguageCode, ValidationError> {
    const parts = code.trim().split("+");
    const unknown = parts.filter((part) => !this.NAMES.has(part));

    if (unknown.length > 0) {
      return err(
        new ValidationError("Unsupported language code", {
          field: "language",
          value: code,
          unknownParts: unknown,
        }),
      );
    }

    return ok(new LanguageCode(code.trim()));
  }

  static isSupported(code: string): boolean {
    return this.NAMES.has(code);
  }

  /**
   * Human-readable name, or the code itself when it is not in the table.
   */
  static getName(code: string): string {
    return this.NAMES.get(code) ?? code;
  }

  static list(): LanguageEntry[] {
    return Array.from(this.NAMES, ([code, name]) => ({ code, name }));
  }

  getName(): string {
    return this.value
      .split("+")
      .map((part) => LanguageCode.getName(part))
      .join(" + ");
  }

  toString(): string {
    return this.value;
  }
}
