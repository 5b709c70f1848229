import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { generateApiKey, hashApiKey } from "@netops/auth";

const USAGE = "Usage: generate-api-key [--count n] [--bytes n] [--hash] [--json]";

type GeneratedKey = {
  key: string;
  sha256?: string;
};

const parsePositiveInt = (value: string | undefined, fallback: number, flag: string): number => {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }

  return parsed;
};

export const generateKeys = (input: { count: number; bytes: number; hash: boolean }): GeneratedKey[] =>
  Array.from({ length: input.count }, () => {
    const key = generateApiKey(input.bytes);
    return input.hash ? { key, sha256: hashApiKey(key) } : { key };
  });

export const formatKeys = (keys: GeneratedKey[], json: boolean): string => {
  if (json) {
    return JSON.stringify({ keys }, null, 2);
  }

  const lines = keys.map((entry) => (entry.sha256 ? `${entry.key}  sha256:${entry.sha256}` : entry.key));
  lines.push("");
  lines.push(`API_KEYS=${keys.map((entry) => entry.key).join(",")}`);

  const hashes = keys.flatMap((entry) => (entry.sha256 ? [entry.sha256] : []));
  if (hashes.length > 0) {
    lines.push(`API_KEY_HASHES=${hashes.join(",")}`);
  }

  return lines.join("\n");
};

const main = (): void => {
  const { values } = parseArgs({
    options: {
      count: { type: "string", short: "c" },
      bytes: { type: "string", short: "b" },
      hash: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const keys = generateKeys({
    count: parsePositiveInt(values.count, 1, "--count"),
    bytes: parsePositiveInt(values.bytes, 32, "--bytes"),
    hash: values.hash === true,
  });

  console.log(formatKeys(keys, values.json === true));
};

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  try {
    main();
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    console.error(USAGE);
    process.exit(1);
  }
}
