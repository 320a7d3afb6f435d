import { randomBytes } from "crypto";

export function generatePassword(): string {
  return randomBytes(16).toString("base64url");
}

export function secretNameFor(namespace: string): string {
  return `${namespace}-db-secret`;
}
