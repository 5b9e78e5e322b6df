const rawBase = import.meta.env.VITE_DATA_BASE_URL?.trim() ?? "";

const isUsableBase = (value: string) => value === "" || /^(https?:\/\/|\/)/.test(value);

export const DATA_CONFIG_ERROR = isUsableBase(rawBase)
  ? null
  : `VITE_DATA_BASE_URL must be an absolute URL or a path starting with "/", got "${rawBase}".`;

// Strip a trailing slash to keep URL joins predictable.
export const DATA_BASE_URL = rawBase.replace(/\/$/, "");
