import fs from "node:fs";
import path from "node:path";
import { load } from "cheerio";

const INDEX_FILE_NAME = "index.html";

const TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>PDF Index</title>
  <style>
    body { font-family: sans-serif; margin: 2em; }
    input[type="text"] { width: 300px; padding: 8px; margin-bottom: 20px; }
    ul { list-style-type: none; padding: 0; }
    li { margin: 6px 0; }
    a { text-decoration: none; color: #0066cc; }
    a:hover { text-decoration: underline; }
  </style>
  <script>
    window.onload = () => {
      document.getElementById("search").focus();
    };
    function search() {
      const input = document.getElementById("search").value.toLowerCase();
      document.querySelectorAll("li").forEach((item) => {
        item.style.display = item.textContent.toLowerCase().includes(input) ? "" : "none";
      });
    }
  </script>
</head>
<body>
  <h1></h1>
  <input type="text" id="search" onkeyup="search()" placeholder="Search PDFs...">
  <ul></ul>
</body>
</html>
`;

export function sortFileNames(fileNames: readonly string[]): string[] {
  return [...fileNames].sort((a, b) => {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

export function renderIndexPage(heading: string, fileNames: readonly string[]): string {
  const $ = load(TEMPLATE);
  $("h1").text(heading);
  const list = $("ul");
  for (const fileName of sortFileNames(fileNames)) {
    const link = $("<a></a>").attr("href", encodeURIComponent(fileName)).text(fileName);
    list.append($("<li></li>").append(link));
  }
  return $.html();
}

/** Writes `index.html` into `outputDir` through a temporary file and returns its path. */
export async function generateIndexPage(outputDir: string, fileNames: readonly string[]): Promise<string> {
  const absoluteDir = path.resolve(outputDir);
  const target = path.join(absoluteDir, INDEX_FILE_NAME);
  const temporary = `${target}.${process.pid}.tmp`;
  const html = renderIndexPage(path.basename(absoluteDir), fileNames);

  await fs.promises.writeFile(temporary, html, "utf-8");
  try {
    await fs.promises.rename(temporary, target);
  } catch (error) {
    await fs.promises.rm(temporary, { force: true });
    throw error;
  }
  return target;
}
