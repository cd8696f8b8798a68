import { Effect } from "effect";
import { FileSystem } from "@effect/platform";
import { InputError } from "../errors/input.error.js";
import { parseLoadCsv } from "./csv.js";

const SPREADSHEET_EXTENSION = /\.(xlsx|xls)$/i;

export const readLoadFile = (
  path: string
): Effect.Effect<readonly number[], InputError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (SPREADSHEET_EXTENSION.test(path)) {
      return yield* new InputError({
        message: `${path} is a spreadsheet; export the load column as CSV`,
      });
    }

    const fs = yield* FileSystem.FileSystem;
    const content = yield* fs.readFileString(path).pipe(
      Effect.mapError(
        (err) => new InputError({ message: `Could not read load file ${path}: ${err.message}` })
      )
    );

    const values = yield* parseLoadCsv(content);
    yield* Effect.logInfo(`Read ${values.length} load values from ${path}`);

    return values;
  });
