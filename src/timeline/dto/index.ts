export * from './analyze-fixes.dto';
export * from './stop-response.dto';
