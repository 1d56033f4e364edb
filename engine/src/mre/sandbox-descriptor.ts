/**
 * Sandbox descriptor - how to install, build and test an MRE inside a container
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ProjectLanguage } from '../metrics/source-scanner';

const PROJECT_LANGUAGES = [
  'python',
  'javascript',
  'typescript',
  'go',
  'ruby',
  'rust',
  'java',
  'php',
  'csharp',
  'kotlin',
  'unknown',
] as const satisfies readonly ProjectLanguage[];

export const SandboxDescriptorSchema = z.object({
  language: z.enum(PROJECT_LANGUAGES),
  framework: z.string().nullable(),
  image: z.string().min(1),
  installCommand: z.string(),
  /** Empty when the language has no separate build step */
  buildCommand: z.string(),
  testCommand: z.string(),
  /** Files copied into the MRE, relative */
  files: z.array(z.string()),
  contextDegraded: z.boolean(),
});

export type SandboxDescriptor = z.infer<typeof SandboxDescriptorSchema>;

/** Engine-owned directory inside an MRE; patches may not write below it */
export const SANDBOX_META_DIR = '.repairgate';

/** Location of the descriptor inside an MRE */
export const SANDBOX_DESCRIPTOR_PATH = `${SANDBOX_META_DIR}/sandbox.json`;

/**
 * Load and validate the descriptor an MRE carries
 */
export async function readSandboxDescriptor(root: string): Promise<SandboxDescriptor> {
  const raw = await fs.readFile(path.join(root, SANDBOX_DESCRIPTOR_PATH), 'utf-8');
  return SandboxDescriptorSchema.parse(JSON.parse(raw));
}

interface Toolchain {
  image: string;
  installCommand: string;
  buildCommand: string;
  testCommand: string;
}

const TOOLCHAINS: Record<ProjectLanguage, Toolchain> = {
  python: {
    image: 'python:3.11-slim',
    installCommand: 'if [ -f requirements.txt ]; then pip install -q -r requirements.txt; fi; pip install -q pytest',
    buildCommand: 'python -m compileall -q .',
    testCommand: 'python -m pytest -q',
  },
  javascript: {
    image: 'node:20-alpine',
    installCommand: 'npm install --no-audit --no-fund',
    buildCommand: 'npm run build --if-present',
    testCommand: 'npm test',
  },
  typescript: {
    image: 'node:20-alpine',
    installCommand: 'npm install --no-audit --no-fund',
    buildCommand: 'npx tsc --noEmit',
    testCommand: 'npm test',
  },
  go: {
    image: 'golang:1.22-alpine',
    installCommand: 'go mod download',
    buildCommand: 'go build ./...',
    testCommand: 'go test ./...',
  },
  rust: {
    image: 'rust:1-slim',
    installCommand: 'cargo fetch',
    buildCommand: 'cargo build',
    testCommand: 'cargo test',
  },
  ruby: {
    image: 'ruby:3.3-slim',
    installCommand: 'bundle install',
    buildCommand: '',
    testCommand: 'bundle exec rake test',
  },
  java: {
    image: 'maven:3-eclipse-temurin-21',
    installCommand: 'mvn -q dependency:resolve',
    buildCommand: 'mvn -q -DskipTests package',
    testCommand: 'mvn -q test',
  },
  php: {
    image: 'composer:2',
    installCommand: 'composer install --no-interaction',
    buildCommand: '',
    testCommand: 'vendor/bin/phpunit',
  },
  csharp: {
    image: 'mcr.microsoft.com/dotnet/sdk:8.0',
    installCommand: 'dotnet restore',
    buildCommand: 'dotnet build --no-restore',
    testCommand: 'dotnet test --no-build',
  },
  kotlin: {
    image: 'gradle:8-jdk21',
    installCommand: 'gradle dependencies -q',
    buildCommand: 'gradle assemble -q',
    testCommand: 'gradle test -q',
  },
  unknown: {
    image: 'alpine:3.20',
    installCommand: '',
    buildCommand: '',
    testCommand: '',
  },
};

/** Dependency name -> framework label, searched in manifest text */
const FRAMEWORK_MARKERS: Array<{ languages: ProjectLanguage[]; pattern: RegExp; framework: string }> = [
  { languages: ['python'], pattern: /\bfastapi\b/i, framework: 'fastapi' },
  { languages: ['python'], pattern: /\bdjango\b/i, framework: 'django' },
  { languages: ['python'], pattern: /\bflask\b/i, framework: 'flask' },
  { languages: ['javascript', 'typescript'], pattern: /"next"\s*:/, framework: 'next' },
  { languages: ['javascript', 'typescript'], pattern: /"@nestjs\/core"\s*:/, framework: 'nestjs' },
  { languages: ['javascript', 'typescript'], pattern: /"express"\s*:/, framework: 'express' },
  { languages: ['javascript', 'typescript'], pattern: /"react"\s*:/, framework: 'react' },
  { languages: ['go'], pattern: /github\.com\/gin-gonic\/gin/, framework: 'gin' },
  { languages: ['rust'], pattern: /^\s*actix-web\s*=/m, framework: 'actix-web' },
  { languages: ['ruby'], pattern: /['"]rails['"]/, framework: 'rails' },
  { languages: ['java', 'kotlin'], pattern: /spring-boot/, framework: 'spring-boot' },
];

export function detectFramework(language: ProjectLanguage, manifestText: string): string | null {
  const marker = FRAMEWORK_MARKERS.find(
    entry => entry.languages.includes(language) && entry.pattern.test(manifestText)
  );
  return marker ? marker.framework : null;
}

export function buildSandboxDescriptor(input: {
  language: ProjectLanguage;
  manifestText: string;
  files: string[];
  testPath?: string;
  contextDegraded: boolean;
}): SandboxDescriptor {
  const toolchain = TOOLCHAINS[input.language];
  const testCommand =
    input.language === 'python' && input.testPath
      ? `${toolchain.testCommand} ${input.testPath}`
      : toolchain.testCommand;

  return {
    language: input.language,
    framework: detectFramework(input.language, input.manifestText),
    image: toolchain.image,
    installCommand: toolchain.installCommand,
    buildCommand: toolchain.buildCommand,
    testCommand,
    files: [...input.files],
    contextDegraded: input.contextDegraded,
  };
}
