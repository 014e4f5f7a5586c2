/**
 * Parser Types
 */

export type TokenType =
    | 'ATOM'          // p, q, rain, x1
    | 'NOT'           // ~
    | 'AND'           // &
    | 'OR'            // |
    | 'IMPLIES'       // >>
    | 'IFF'           // <<>>
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
