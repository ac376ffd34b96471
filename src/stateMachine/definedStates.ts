// src/stateMachine/definedStates.ts

export enum PrintJobStates {
    INIT = 'INIT',
    LOAD_IMAGE = 'LOAD_IMAGE',
    ENHANCE = 'ENHANCE',
    FIT_TO_LABEL = 'FIT_TO_LABEL',
    DITHER = 'DITHER',
    ENCODE_OUTPUT = 'ENCODE_OUTPUT',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    SUBMIT_PRINT = 'SUBMIT_PRINT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
