import { ConfigurationError } from "./errors";

export type RegistrarConfig = {
  readonly apiUser: string;
  readonly apiKey: string;
  readonly username: string;
  readonly clientIp: string;
  readonly sandbox: boolean;
};

const REQUIRED_ENV = {
  apiUser: "NAMECHEAP_API_USER",
  apiKey: "NAMECHEAP_API_KEY",
  username: "NAMECHEAP_USERNAME",
  clientIp: "CLIENT_IP",
} as const;

const readEnv = (env: NodeJS.ProcessEnv, name: string): string =>
  (env[name] ?? "").trim();

const parseFlag = (raw: string): boolean =>
  ["true", "1"].includes(raw.toLowerCase());

export const loadRegistrarConfig = (env: NodeJS.ProcessEnv = process.env): RegistrarConfig => {
  const missing = Object.values(REQUIRED_ENV).filter((name) => readEnv(env, name) === "");

  if (missing.length > 0) throw new ConfigurationError(missing);

  return Object.freeze({
    apiUser: readEnv(env, REQUIRED_ENV.apiUser),
    apiKey: readEnv(env, REQUIRED_ENV.apiKey),
    username: readEnv(env, REQUIRED_ENV.username),
    clientIp: readEnv(env, REQUIRED_ENV.clientIp),
    sandbox: parseFlag(readEnv(env, "NAMECHEAP_SANDBOX")),
  });
};
