/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
binembed - embed files into C++ sources v${VERSION}

USAGE:
  binembed <command> [inputs...] [options]

COMMANDS:
  generate <inputs...>           Write <name>.h and <name>.cpp embedding the inputs
  list <inputs...>               Show the files that would be embedded
  inspect <file.cpp> [name]      Show the files embedded in a generated source

GLOBAL OPTIONS:
  -h, --help                     Show help
  -v, --version                  Show version
  -V, --verbose                  Verbose output
  -q, --quiet                    Suppress progress output
  -c, --config <file>            Config file path (default: binembed.json)

GENERATE/LIST OPTIONS:
  -d, --dir <path>               Output directory (default: working directory)
  -o, --out <name>               Output file name without extension (default: embedded_files)
  -n, -ns, --namespace <name>    C++ namespace, such as assets or game::assets
  -s, --style <string|bytes>     Literal style for file data (default: string)
  -w, --line-width <n>           Wrap string literals at this width (default: 120)
  -r, --row-size <n>             Byte constants per row (default: 20)
  --on-duplicate <policy>        overwrite (default) or error on repeated file names

EXAMPLES:
  binembed generate assets/ -d src/generated -n game::assets
  binembed generate logo.png shader.glsl --style bytes
  binembed list assets/
  binembed inspect src/generated/embedded_files.cpp logo.png
`);
};
