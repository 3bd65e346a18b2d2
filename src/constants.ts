/**
 * Application-wide constants.
 *
 * The catalogue of README sections offered by the CLI, plus the heuristics the
 * repository analyzer uses: extension → language, ignored directories,
 * manifest and entry-point files worth sampling, and license file names.
 */

import type { SectionDescriptor } from "./core/types.js";

/** Every section the CLI can generate, in default document order. */
export const SECTION_CATALOG: readonly SectionDescriptor[] = [
  {
    id: "introduction",
    name: "Introduction",
    description:
      "Brief overview explaining what the project does, the problem it solves, and its key benefits",
    required: true,
    order: 1,
  },
  {
    id: "table-of-contents",
    name: "Table of Contents",
    description: "Navigational links to all major sections in the README",
    required: false,
    order: 2,
  },
  {
    id: "features",
    name: "Features",
    description: "Comprehensive list of the project's key features and capabilities",
    required: true,
    order: 3,
  },
  {
    id: "tech-stack",
    name: "Tech Stack",
    description: "Technologies, frameworks, and libraries used in the project",
    required: false,
    order: 4,
  },
  {
    id: "prerequisites",
    name: "Prerequisites",
    description: "System requirements and dependencies needed before installation",
    required: false,
    order: 5,
  },
  {
    id: "installation",
    name: "Installation",
    description:
      "Step-by-step instructions for setting up and installing the project locally",
    required: true,
    order: 6,
  },
  {
    id: "configuration",
    name: "Configuration",
    description: "Environment variables, configuration files, and setup options",
    required: false,
    order: 7,
  },
  {
    id: "usage",
    name: "Usage",
    description: "Code examples and instructions showing how to use the project",
    required: true,
    order: 8,
  },
  {
    id: "api-reference",
    name: "API Reference",
    description: "API endpoints, methods, parameters, and responses documentation",
    required: false,
    order: 9,
  },
  {
    id: "project-structure",
    name: "Project Structure",
    description: "Overview of the codebase organization, key directories, and files",
    required: false,
    order: 10,
  },
  {
    id: "testing",
    name: "Testing",
    description: "Instructions for running tests and understanding test coverage",
    required: false,
    order: 11,
  },
  {
    id: "deployment",
    name: "Deployment",
    description: "Steps and requirements for deploying the project to production",
    required: false,
    order: 12,
  },
  {
    id: "contributing",
    name: "Contributing",
    description:
      "Guidelines and workflow for contributing code, reporting issues, and submitting pull requests",
    required: false,
    order: 13,
  },
  {
    id: "license",
    name: "License",
    description: "Project licensing information and usage terms",
    required: false,
    order: 14,
  },
];

export const DEFAULT_SECTION_IDS: readonly string[] = [
  "introduction",
  "features",
  "installation",
  "usage",
  "contributing",
  "license",
];

export const DEFAULT_OUTPUT_FILE = "README.md";

export const PROJECT_STRUCTURE_SECTION = "project structure";
export const USAGE_LIKE_SECTIONS: readonly string[] = [
  "usage",
  "examples",
  "getting started",
];

export const LANGUAGE_BY_EXTENSION: Readonly<Record<string, string>> = {
  ".js": "JavaScript",
  ".jsx": "JavaScript",
  ".ts": "TypeScript",
  ".tsx": "TypeScript",
  ".py": "Python",
  ".java": "Java",
  ".cpp": "C++",
  ".c": "C",
  ".h": "C",
  ".hpp": "C++",
  ".cs": "C#",
  ".go": "Go",
  ".rs": "Rust",
  ".rb": "Ruby",
  ".php": "PHP",
  ".kt": "Kotlin",
  ".swift": "Swift",
  ".scala": "Scala",
  ".sh": "Shell",
  ".ps1": "PowerShell",
  ".html": "HTML",
  ".css": "CSS",
  ".scss": "SCSS",
  ".less": "Less",
  ".vue": "Vue",
  ".svelte": "Svelte",
  ".dart": "Dart",
  ".lua": "Lua",
  ".r": "R",
  ".m": "Objective-C",
  ".mm": "Objective-C++",
  ".sql": "SQL",
};

export const IGNORE_DIRS: readonly string[] = [
  "node_modules",
  ".git",
  "dist",
  "build",
  ".next",
  "__pycache__",
  "target",
  ".cargo",
  "vendor",
];

/** Dotfiles that still belong in the rendered file tree. */
export const VISIBLE_DOTFILES: readonly string[] = [".env.example", ".gitignore"];

export const MANIFEST_SAMPLE_FILES: readonly string[] = [
  "README.md",
  "package.json",
  "pyproject.toml",
  "requirements.txt",
  "Cargo.toml",
  "go.mod",
  "pom.xml",
  "build.gradle",
];

export const ENTRY_POINTS: Readonly<Record<string, readonly string[]>> = {
  JavaScript: ["index.js", "app.js", "main.js", "src/index.js"],
  TypeScript: ["index.ts", "app.ts", "main.ts", "src/index.ts"],
  Python: ["main.py", "app.py", "__init__.py", "setup.py"],
  Java: ["Main.java", "App.java"],
  Go: ["main.go"],
  Rust: ["main.rs", "lib.rs", "src/main.rs", "src/lib.rs"],
  "C++": ["main.cpp", "main.cc"],
  C: ["main.c"],
  Ruby: ["app.rb", "main.rb"],
  PHP: ["index.php", "app.php"],
};

export const LICENSE_FILES: readonly string[] = [
  "LICENSE",
  "LICENSE.md",
  "LICENSE.txt",
  "License",
  "License.md",
  "License.txt",
  "license",
  "license.md",
  "license.txt",
];

export const README_FILES: readonly string[] = [
  "README.md",
  "README.rst",
  "README.txt",
  "README",
  "readme.md",
  "readme.rst",
  "readme.txt",
  "readme",
];

export const SAMPLE_CHAR_LIMIT = 1000;
export const SAMPLE_TOKEN_BUDGET = 8000;
export const FILE_TREE_DEPTH = 2;
