/// # configuration errors
///
/// there's exactly one kind of error linetally throws on purpose: the user
/// told us something that doesn't make sense. a range like `9-3`, a column
/// expression pointing at column 7 of a five-column table, a category name
/// that no file declares. those aren't data conditions we can paper over,
/// so they surface as a `ConfigError` and the CLI stops.
///
/// everything else (a missing file, a division by zero) is reported inline
/// and never thrown.

export class ConfigError extends Error {
  /// 1-based line in the stats file, when the error came from parsing it.
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "ConfigError";
    this.line = line;
  }
}
