export enum TokenErrorCode {
    INVALID_TOKEN = 'token_invalid',
    INVALID_CLAIMS = 'token_invalid_claims',
}
