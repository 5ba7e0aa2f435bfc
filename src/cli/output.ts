export interface Output {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processOutput: Output = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export function println(output: Output, line = ""): void {
  output.stdout(`${line}\n`);
}

export function printError(output: Output, line: string): void {
  output.stderr(`${line}\n`);
}
