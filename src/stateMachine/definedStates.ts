// src/stateMachine/definedStates.ts

export enum ConverterStates {
    INIT = 'INIT',
    VALIDATE_OPTIONS = 'VALIDATE_OPTIONS',
    LOAD_IMAGE = 'LOAD_IMAGE',
    RESOLVE_TILE_SIZE = 'RESOLVE_TILE_SIZE',
    SUMMARIZE_TILES = 'SUMMARIZE_TILES',
    MAP_GLYPHS = 'MAP_GLYPHS',
    RENDER_DOCUMENT = 'RENDER_DOCUMENT',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
