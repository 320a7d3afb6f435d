import fs from "fs";

export interface DeploymentPaths {
  repoRoot: string;
  chartPath: string;
  valuesLocal: string;
  valuesProd: string;
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/** Throws on the first missing path so startup fails before serving requests. */
export function validateDeploymentPaths(paths: DeploymentPaths): DeploymentPaths {
  if (!isDirectory(paths.repoRoot)) {
    throw new Error(`Repository root not found: ${paths.repoRoot}`);
  }
  if (!isDirectory(paths.chartPath)) {
    throw new Error(`Helm chart directory not found: ${paths.chartPath}`);
  }
  if (!isFile(paths.valuesLocal)) {
    throw new Error(`values-local.yaml not found: ${paths.valuesLocal}`);
  }
  if (!isFile(paths.valuesProd)) {
    throw new Error(`values-prod.yaml not found: ${paths.valuesProd}`);
  }
  return paths;
}
