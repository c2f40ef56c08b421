import type { DataDirectories } from './resolvers/types';

export function excelKeywordHelp(excelDir: string): string {
  return `# Excel Keywords
Excel keywords \`{{XL!...}}\` read values from the workbook uploaded with the document, or from a workbook named in the keyword. Named workbooks are looked up in the \`${excelDir}\` folder, then in the working directory.

### {{XL!\`excel_file.xlsx\`!CELL!\`Cell\`}}
Use \`excel_file.xlsx\` instead of the uploaded workbook. Every form below accepts the file prefix.

### {{XL!CELL!\`Cell\`}} / {{XL!CELL!\`Sheet\`!\`Cell\`}}
Value of \`Cell\` (ex: A1), on the first sheet or on \`Sheet\`.

### {{XL!LAST!\`Cell\`}} / {{XL!LAST!\`Sheet\`!\`Cell\`}}
Last non-empty value going down from \`Cell\`. Used for totals.

### {{XL!LAST!\`Sheet\`!\`Cell\`!\`Title\`}}
From \`Cell\`, scan right until \`Title\` is found, then take the last non-empty value going down that column.

### {{XL!RANGE!\`Start Cell\`:\`End Cell\`}} / {{XL!RANGE!\`Sheet\`!\`Start Cell\`:\`End Cell\`}}
Values from \`Start Cell\` (ex: A1) to \`End Cell\` (ex: G13) as a formatted table.

### {{XL!RANGE!\`Named Range\`}} / {{\`Named Range\`}}
Values of a workbook defined name as a formatted table.

### {{XL!COLUMN!\`Sheet\`!\`Cell 1\`,\`Cell 2\`,...}}
Table built from the columns under \`Cell 1\` (ex: A1), \`Cell 2\` (ex: C1)... The cells must be on the same row. Example: {{XL!budget.xlsx!COLUMN!Support!C4,E4,J4}}.

### {{XL!COLUMN!\`Sheet\`!\`Title 1\`,\`Title 2\`,...!\`Row\`}}
Table built from the columns titled \`Title 1\`, \`Title 2\`... in row \`Row\` (row 1 when omitted). Example: {{XL!sales.xlsx!COLUMN!Distribution Plan!Unit,DHTC,Total!4}}.
`;
}

export function inputKeywordHelp(): string {
  return `# User Input Keywords
Input keywords \`{{INPUT!...}}\` are answered by the values sent with the document. Unanswered fields use their default.

### {{INPUT!TEXT!\`label\`!\`default_value\`}}
Single-line text.
### {{INPUT!AREA!\`label\`!\`default_value\`!\`height\`}}
Multi-line text; \`height\` (ex: 200) is a hint for the form.
### {{INPUT!DATE!\`label\`!\`default_date\`!\`format\`}}
A date such as \`1990/01/01\` or \`today\`, written in \`format\`: YYYY/MM/DD, DD/MM/YYYY or MM/DD/YYYY.
### {{INPUT!SELECT!\`label\`!\`option1,option2,...\`}} / {{INPUT!SELECT!\`label\`!\`option1\`!\`option2\`!...}}
A choice among the options; the first one is the default.
### {{INPUT!CHECK!\`label\`!\`default_state\`}}
A checkbox (ex: true), rendered as \`true\` or \`false\`.
`;
}

export function templateKeywordHelp(templatesDir: string): string {
  return `# Template Keywords
Template keywords \`{{TEMPLATE!...}}\` insert content from Word files in the \`${templatesDir}\` folder.

### {{TEMPLATE!\`filename.docx\`}}
Insert the whole document.
### {{TEMPLATE!\`filename.docx\`!\`section=heading\`}}
Insert the section under \`heading\`, heading included.
### {{TEMPLATE!\`filename.docx\`!\`section=heading\`!\`title=false\`}}
Insert the section without its heading.
### {{TEMPLATE!\`filename.docx\`!\`section=heading_start:heading_end\`}}
Insert everything from \`heading_start\` up to \`heading_end\`.
### {{TEMPLATE!\`filename.docx\`!\`section=heading_start:heading_end&title=false\`}}
Same, without the start heading.
`;
}

export function jsonKeywordHelp(jsonDir: string): string {
  return `# JSON Keywords
JSON keywords \`{{JSON!...}}\` read values from JSON files, looked up as given and then in the \`${jsonDir}\` folder.

### {{JSON!!\`filename.json\`}} / {{JSON!\`filename.json\`!\`$.\`}}
Insert the whole document.
### {{JSON!\`filename.json\`!\`$.key\`}}
Insert the value at \`key\`. Example: {{JSON!launch.json!$.configurations[0].name}}.
### {{JSON!\`filename.json\`!\`$.key\`!\`SUM\`}}
Sum the numbers in the list at \`key\`. Example: {{JSON!sales.json!$.monthly_totals!SUM}}.
### {{JSON!\`filename.json\`!\`$.key\`!\`JOIN(, )\`}}
Join the list at \`key\` with a delimiter. Example: {{JSON!users.json!$.names!JOIN(, )}}.
### {{JSON!\`filename.json\`!\`$.key\`!\`BOOL(Yes/No)\`}}
Render the value at \`key\` as one of two words. Example: {{JSON!status.json!$.system_active!BOOL(Online/Offline)}}.
`;
}

export function aiKeywordHelp(aiDir: string): string {
  return `# AI Keywords
AI keywords \`{{AI!...}}\` summarize a Word or text document, looked up as given and then in the \`${aiDir}\` folder. An OpenAI API key must be configured.

### {{AI!\`source-doc.docx\`!\`prompt_file.txt\`!\`words=100\`}}
Summarize the whole document in at most 100 words. A prompt ending in \`.txt\` is read from that file; anything else is used as the prompt itself.
### {{AI!\`source-doc.docx\`!\`prompt_file.txt\`!\`section=section header&words=100\`}}
Summarize one section of the document.
### {{AI!\`source-doc.docx\`!\`prompt_file.txt\`!\`section=Attractions:Unique Experiences&words=100\`}}
Summarize the content from \`Attractions\` up to \`Unique Experiences\`.
`;
}

export function keywordHelp(dirs: Omit<DataDirectories, 'output'>): string {
  return [
    excelKeywordHelp(dirs.excel),
    inputKeywordHelp(),
    templateKeywordHelp(dirs.templates),
    jsonKeywordHelp(dirs.json),
    aiKeywordHelp(dirs.ai)
  ].join('\n');
}
