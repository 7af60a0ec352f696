// The package entry runs a self-test when it is not loaded through require();
// the library file underneath is the same function without it.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse from 'pdf-parse';
  export default pdfParse;
}
