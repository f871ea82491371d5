export class Slugs {
  public static SLUG_CHAR_LIMIT = 32;

  public static ServiceSlugDescription = `must contain only lower alphanumeric and single hyphens in the middle; max length ${Slugs.SLUG_CHAR_LIMIT}`;
  public static ServiceSlugValidator = new RegExp(`^(?!-)(?!.{0,${Slugs.SLUG_CHAR_LIMIT}}--)[a-z0-9-]{1,${Slugs.SLUG_CHAR_LIMIT}}(?<!-)$`);

  public static DurationDescription = 'must be a duration such as 500ms, 10s or 1m';
  public static DurationValidator = /^(\d+)(ms|s|m|h)$/;

  public static EndpointDescription = 'must be an endpoint in the form host:port';
  public static EndpointValidator = /^[\w.-]+:\d{1,5}$/;
}

const DURATION_UNITS: { [unit: string]: number } = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Converts a duration string (`500ms`, `10s`, `1m`, `2h`) to milliseconds.
 */
export const parseDuration = (duration: string): number => {
  const match = Slugs.DurationValidator.exec(duration);
  if (!match) {
    throw new Error(`Invalid duration: ${duration}`);
  }
  return Number.parseInt(match[1]) * DURATION_UNITS[match[2]];
};
