import { QueueError } from "../queue/errors.js";
import type { TextModule } from "./types.js";

// Diagnostics module: trivially deterministic, handy for smoke tests
export const upperModule: TextModule = {
  name: "upper",

  process(text: string): string {
    return text.toUpperCase();
  },

  convert(result: string, format: string, id: string): string {
    if (format !== "json") {
      throw new QueueError("InvalidArgument", `upper: unsupported format ${format}`);
    }
    return JSON.stringify({ id, result });
  },
};
