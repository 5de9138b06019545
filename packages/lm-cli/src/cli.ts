import { main } from "./main";

void main(process.argv.slice(2), {
  write: (text) => process.stdout.write(text),
  exit: (code) => process.exit(code)
});
