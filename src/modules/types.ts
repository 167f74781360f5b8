/**
 * A named text-processing capability. `convert` turns a stored result into
 * another representation on retrieval; modules without it only serve the
 * raw result.
 */
export interface TextModule {
  readonly name: string;
  process(text: string): Promise<string> | string;
  convert?(result: string, format: string, id: string): string;
}
