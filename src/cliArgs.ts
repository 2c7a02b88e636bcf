export interface CliOptions {
  showHelp: boolean;
  showVersion: boolean;
  overwrite: boolean;
  configPath?: string;
  shellModule?: string;
  historyPath?: string;
  qFiles: string[];
  errors: string[];
}

const VALUE_FLAGS = {
  "--config": "configPath",
  "-c": "configPath",
  "--shell": "shellModule",
  "-s": "shellModule",
  "--history": "historyPath",
} as const;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

export function parseArguments(args: string[]): CliOptions {
  const options: CliOptions = {
    showHelp: false,
    showVersion: false,
    overwrite: false,
    qFiles: [],
    errors: [],
  };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];

    if (arg === "--help" || arg === "-h") {
      options.showHelp = true;
    } else if (arg === "--version" || arg === "-v") {
      options.showVersion = true;
    } else if (arg === "--overwrite") {
      options.overwrite = true;
    } else if (isValueFlag(arg)) {
      const value = args[index + 1];
      if (value === undefined || value.startsWith("-")) {
        options.errors.push(`${arg} requires a value`);
      } else {
        options[VALUE_FLAGS[arg]] = value;
        index += 1;
      }
    } else if (arg.startsWith("-")) {
      options.errors.push(`Unknown option: ${arg}`);
    } else {
      options.qFiles.push(arg);
    }
  }

  return options;
}
