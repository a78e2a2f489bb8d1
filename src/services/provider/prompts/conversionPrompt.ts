export const CONVERSION_SYSTEM_PROMPT = `
You are an assistant that reimplements JavaScript programs in high performance C++.
Respond only with C++ code. Use comments sparingly and do not explain your work beyond an occasional comment.
The C++ program must print exactly the same output as the JavaScript program, in the fastest possible time.
`.trim();

export const CONVERSION_USER_PROMPT_TEMPLATE = `
Rewrite this JavaScript code in C++ with the fastest possible implementation that produces identical output.
Respond only with C++ code; do not explain your work other than a few comments.
Pay attention to number types so that no integer overflows, and remember to #include every header you need, such as <iomanip>.

{{SOURCE_TEXT}}
`.trim();

export function buildConversionMessages(sourceText: string): Array<{ role: 'system' | 'user'; content: string }> {
    return [
        { role: 'system', content: CONVERSION_SYSTEM_PROMPT },
        // Function replacement keeps "$&"-style sequences in the source literal.
        { role: 'user', content: CONVERSION_USER_PROMPT_TEMPLATE.replace('{{SOURCE_TEXT}}', () => sourceText) },
    ];
}
