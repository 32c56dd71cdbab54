/**
 * Lee una propiedad de un valor capturado, sea o no un Error
 */
export const readField = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;

/**
 * `code` de un error de sistema (ENOENT, ERR_PARSE_ARGS_*, exit code de un proceso)
 */
export const errorCode = (error: unknown): string | number | undefined => {
  const code = readField(error, 'code');
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
};

/**
 * Describe un valor capturado en un catch (que puede no ser un Error)
 */
export const describeError = (error: unknown): string => {
  const message = readField(error, 'message');
  return typeof message === 'string' ? message : String(error);
};

/**
 * Stack del error si existe, para pasar como trace al Logger
 */
export const errorStack = (error: unknown): string | undefined => {
  const stack = readField(error, 'stack');
  return typeof stack === 'string' ? stack : undefined;
};
