// The package root runs a self-test when imported from ESM; the library entry does not.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import type { Options, Result } from 'pdf-parse';
  function pdfParse(dataBuffer: Buffer, options?: Options): Promise<Result>;
  export default pdfParse;
}
