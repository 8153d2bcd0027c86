export type RedactionMode = "standard" | "strict" | "off";

export type RedactionMatch = {
  type: string;
  count: number;
  hashes: string[];
};

export type RedactionReport = {
  redacted: boolean;
  matches: RedactionMatch[];
};

export type RedactionOptions = {
  mode?: RedactionMode;
};
