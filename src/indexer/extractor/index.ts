export {
  PdfTextExtractor,
  loadPdfPages,
  PAGE_SEPARATOR,
  type TextExtractor,
  type PdfPage,
  type PdfPageLoader,
} from './pdf-extractor.js';
