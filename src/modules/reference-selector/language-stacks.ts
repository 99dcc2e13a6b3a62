/**
 * Build stacks used by the built-in default templates.
 */

export interface LanguageStack {
  /** Canonical language key */
  readonly language: string
  /** Image for compile and test jobs */
  readonly buildImage: string
  readonly compile: readonly string[]
  readonly test: readonly string[]
  /** Paths handed from compile to later stages */
  readonly artifacts: readonly string[]
  /** Image-build definition body, one instruction per entry */
  readonly imageBuild: readonly string[]
}

const STACKS: readonly LanguageStack[] = [
  {
    language: 'java',
    buildImage: 'maven:3.9-eclipse-temurin-17',
    compile: ['mvn -B clean package -DskipTests'],
    test: ['mvn -B test'],
    artifacts: ['target/*.jar'],
    imageBuild: [
      'FROM eclipse-temurin:17-jre',
      'WORKDIR /app',
      'COPY target/*.jar app.jar',
      'EXPOSE 8080',
      'ENTRYPOINT ["java", "-jar", "/app/app.jar"]',
    ],
  },
  {
    language: 'kotlin',
    buildImage: 'gradle:8.7-jdk17-alpine',
    compile: ['gradle build -x test'],
    test: ['gradle test'],
    artifacts: ['build/libs/*.jar'],
    imageBuild: [
      'FROM eclipse-temurin:17-jre',
      'WORKDIR /app',
      'COPY build/libs/*.jar app.jar',
      'EXPOSE 8080',
      'ENTRYPOINT ["java", "-jar", "/app/app.jar"]',
    ],
  },
  {
    language: 'python',
    buildImage: 'python:3.11-slim',
    compile: ['pip install -r requirements.txt'],
    test: ['pip install -r requirements.txt', 'python -m pytest || echo "no tests"'],
    artifacts: [],
    imageBuild: [
      'FROM python:3.11-slim',
      'WORKDIR /app',
      'COPY requirements.txt .',
      'RUN pip install --no-cache-dir -r requirements.txt',
      'COPY . .',
      'EXPOSE 8000',
      'CMD ["python", "app.py"]',
    ],
  },
  {
    language: 'go',
    buildImage: 'golang:1.22-alpine',
    compile: ['go build -o app ./...'],
    test: ['go test ./...'],
    artifacts: ['app'],
    imageBuild: [
      'FROM golang:1.22-alpine AS build',
      'WORKDIR /src',
      'COPY . .',
      'RUN go build -o /out/app ./...',
      'FROM alpine:3.19',
      'COPY --from=build /out/app /usr/local/bin/app',
      'ENTRYPOINT ["/usr/local/bin/app"]',
    ],
  },
  {
    language: 'rust',
    buildImage: 'rust:1.79-slim',
    compile: ['cargo build --release'],
    test: ['cargo test'],
    artifacts: ['target/release/'],
    imageBuild: [
      'FROM rust:1.79-slim AS build',
      'WORKDIR /src',
      'COPY . .',
      'RUN cargo build --release',
      'FROM debian:bookworm-slim',
      'COPY --from=build /src/target/release/ /usr/local/bin/',
      'CMD ["sh"]',
    ],
  },
  {
    language: 'javascript',
    buildImage: 'node:20-alpine',
    compile: ['npm ci', 'npm run build --if-present'],
    test: ['npm ci', 'npm test --if-present'],
    artifacts: [],
    imageBuild: [
      'FROM node:20-alpine',
      'WORKDIR /app',
      'COPY package*.json ./',
      'RUN npm ci --omit=dev',
      'COPY . .',
      'EXPOSE 3000',
      'CMD ["npm", "start"]',
    ],
  },
  {
    language: 'typescript',
    buildImage: 'node:20-alpine',
    compile: ['npm ci', 'npm run build'],
    test: ['npm ci', 'npm test --if-present'],
    artifacts: ['dist/'],
    imageBuild: [
      'FROM node:20-alpine',
      'WORKDIR /app',
      'COPY package*.json ./',
      'RUN npm ci --omit=dev',
      'COPY dist ./dist',
      'EXPOSE 3000',
      'CMD ["node", "dist/index.js"]',
    ],
  },
  {
    language: 'ruby',
    buildImage: 'ruby:3.3-alpine',
    compile: ['bundle install'],
    test: ['bundle install', 'bundle exec rake test || echo "no tests"'],
    artifacts: [],
    imageBuild: [
      'FROM ruby:3.3-alpine',
      'WORKDIR /app',
      'COPY Gemfile* ./',
      'RUN bundle install',
      'COPY . .',
      'CMD ["ruby", "app.rb"]',
    ],
  },
  {
    language: 'php',
    buildImage: 'composer:2',
    compile: ['composer install --no-dev --no-interaction'],
    test: ['composer install --no-interaction', 'vendor/bin/phpunit || echo "no tests"'],
    artifacts: ['vendor/'],
    imageBuild: ['FROM php:8.3-fpm-alpine', 'WORKDIR /var/www/html', 'COPY . .', 'EXPOSE 9000', 'CMD ["php-fpm"]'],
  },
  {
    language: 'csharp',
    buildImage: 'mcr.microsoft.com/dotnet/sdk:8.0',
    compile: ['dotnet publish -c Release -o out'],
    test: ['dotnet test'],
    artifacts: ['out/'],
    imageBuild: [
      'FROM mcr.microsoft.com/dotnet/aspnet:8.0',
      'WORKDIR /app',
      'COPY out/ .',
      'EXPOSE 8080',
      'ENTRYPOINT ["dotnet", "App.dll"]',
    ],
  },
]

/** Polyglot fallback for languages without a dedicated stack */
export const GENERIC_STACK: LanguageStack = {
  language: 'generic',
  buildImage: 'alpine:3.19',
  compile: ['if [ -f Makefile ]; then apk add --no-cache make && make; else echo "no build step"; fi'],
  test: ['if [ -f Makefile ]; then apk add --no-cache make && make test || true; else echo "no tests"; fi'],
  artifacts: [],
  imageBuild: ['FROM alpine:3.19', 'WORKDIR /app', 'COPY . .', 'CMD ["sh"]'],
}

const ALIASES: Readonly<Record<string, string>> = {
  golang: 'go',
  node: 'javascript',
  nodejs: 'javascript',
  js: 'javascript',
  ts: 'typescript',
  dotnet: 'csharp',
  'c#': 'csharp',
  py: 'python',
}

const BY_LANGUAGE = new Map(STACKS.map((stack) => [stack.language, stack]))

/** Stack for a language (case-insensitive, aliases resolved); generic when unknown */
export function resolveStack(language: string): LanguageStack {
  const key = language.trim().toLowerCase()
  return BY_LANGUAGE.get(ALIASES[key] ?? key) ?? GENERIC_STACK
}

export function supportedLanguages(): string[] {
  return STACKS.map((stack) => stack.language)
}
