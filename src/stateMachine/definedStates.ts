// src/stateMachine/definedStates.ts

export enum EncoderStates {
    INIT = 'INIT',
    READ_PAYLOAD = 'READ_PAYLOAD',
    LOAD_IMAGE = 'LOAD_IMAGE',
    CHECK_CAPACITY = 'CHECK_CAPACITY',
    EMBED_PAYLOAD = 'EMBED_PAYLOAD',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    VERIFY_ENCODING = 'VERIFY_ENCODING',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}

export enum DecoderStates {
    INIT = 'INIT',
    LOAD_IMAGE = 'LOAD_IMAGE',
    EXTRACT_PAYLOAD = 'EXTRACT_PAYLOAD',
    WRITE_OUTPUT = 'WRITE_OUTPUT',
    COMPLETED = 'COMPLETED',
    ERROR = 'ERROR',
}
