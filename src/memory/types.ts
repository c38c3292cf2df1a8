export const MEMORY_FILE_NAME = "MEMORY.md";
export const MEMORY_ENTRY_SEPARATOR = "---";
export const RECENT_MEMORY_ENTRY_COUNT = 3;

export class MemoryFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MemoryFormatError";
  }
}
