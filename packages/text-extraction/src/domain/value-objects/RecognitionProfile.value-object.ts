import { Result, ok, err, ValidationError } from "@ocr-structure/types";

export type RecognitionProfileName =
  | "default"
  | "paragraphs"
  | "long_paragraphs"
  | "document"
  | "single_line"
  | "single_word"
  | "single_char"
  | "sparse_text"
  | "sparse_text_osd"
  | "raw_line"
  | "uniform_block"
  | "numbers_only"
  | "letters_only"
  | "long_text"
  | "academic"
  | "newspaper"
  | "handwritten";

const DIGITS = "0123456789";
const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const PRESERVE_SPACES = "--oem 3 --psm 6 -c preserve_interword_spaces=1";

const PROFILE_FLAGS: Record<RecognitionProfileName, string> = {
  default: "--oem 3 --psm 6",
  paragraphs: PRESERVE_SPACES,
  long_paragraphs: PRESERVE_SPACES,
  document: PRESERVE_SPACES,
  single_line: "--oem 3 --psm 7",
  single_word: "--oem 3 --psm 8",
  single_char: "--oem 3 --psm 10",
  sparse_text: "--oem 3 --psm 11",
  sparse_text_osd: "--oem 3 --psm 12",
  raw_line: "--oem 3 --psm 13",
  uniform_block: `--oem 3 --psm 6 -c tessedit_char_whitelist=${DIGITS}${LETTERS}`,
  numbers_only: `--oem 3 --psm 6 -c tessedit_char_whitelist=${DIGITS}`,
  letters_only: `--oem 3 --psm 6 -c tessedit_char_whitelist=${LETTERS}`,
  long_text: PRESERVE_SPACES,
  academic: PRESERVE_SPACES,
  newspaper: PRESERVE_SPACES,
  handwritten: PRESERVE_SPACES,
};

function isProfileName(name: string): name is RecognitionProfileName {
  return Object.prototype.hasOwnProperty.call(PROFILE_FLAGS, name);
}

/**
 * Value object for a named recognition preset and the engine flags it
 * stands for.
 */
export class RecognitionProfile {
  private constructor(
    private readonly name: string,
    private readonly flags: string,
  ) {}

  /**
   * Creates a profile, rejecting names outside the fixed set.
   */
  static create(name: string): Result<RecognitionProfile, ValidationError> {
    if (!isProfileName(name)) {
      return err(
        new ValidationError("Unknown recognition profile", {
          field: "profile",
          value: name,
          validValues: this.names(),
        }),
      );
    }

    return ok(new RecognitionProfile(name, PROFILE_FLAGS[name]));
  }

  /**
   * Resolves a profile leniently: an unknown name keeps its label but runs
   * with the `default` flags.
   */
  static resolve(name: string): RecognitionProfile {
    return new RecognitionProfile(
      name,
      isProfileName(name) ? PROFILE_FLAGS[name] : PROFILE_FLAGS.default,
    );
  }

  static names(): RecognitionProfileName[] {
    return Object.keys(PROFILE_FLAGS).filter(isProfileName);
  }

  getName(): string {
    return this.name;
  }

  getFlags(): string {
    return this.flags;
  }

  /**
   * Flags split into command-line arguments.
   */
  getArgs(): string[] {
    return this.flags.split(" ").filter((arg) => arg.length > 0);
  }

  isKnown(): boolean {
    return isProfileName(this.name);
  }
}
