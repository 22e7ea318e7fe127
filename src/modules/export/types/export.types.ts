export type ExportFile = {
  filename: string;
  contentType: string;
  content: string;
};
