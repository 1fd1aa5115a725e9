// src/config/index.ts

export const config = {
    document: {
        background: '#262626',
        fontSize: 24,
        // Rendered glyph size relative to the requested font size
        fontScale: 0.75,
    },
    glyphs: {
        charList: 'X',
        asciiForeground: '#e6e6e6',
    },
    tiling: {
        // Auto-sizing aims for a tile this fraction of the image width (~50 columns)
        autoSizeRatio: 0.02,
    },
    outputFile: 'output.html',
    progressBar: {
        format: 'Converting |{bar}| {percentage}% || {value}/{total} state: {state}',
    },
};
