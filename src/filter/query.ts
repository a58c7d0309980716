/*
 * Copyright (C) 2026 Jagrit Gumber
 *
 * This program is free software; you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation; either version 2 of the License, or
 * (at your option) any later version.
 */

import { QueryError } from "../lib/errors";

export type Attribute = "rating" | "purity";

export type Comparator = "<" | "<=" | ">" | ">=" | "==" | "!=";

export type Predicate =
    | {kind: "constant", value: boolean}
    | {kind: "compare", attribute: Attribute, comparator: Comparator, value: number}
    | {kind: "tag", tag: string}
    | {kind: "not", operand: Predicate}
    | {kind: "and", left: Predicate, right: Predicate}
    | {kind: "or", left: Predicate, right: Predicate};

export type Subject = {
    rating: number,
    purity: number,
    tags: readonly string[]
};

type Token =
    | {type: "number", value: number, position: number}
    | {type: "word", value: string, position: number}
    | {type: "tag", value: string, position: number}
    | {type: "comparator", value: Comparator, position: number}
    | {type: "and" | "or" | "not" | "(" | ")", position: number};

const attributes = new Map<string, Attribute>([
    ["r", "rating"],
    ["rating", "rating"],
    ["p", "purity"],
    ["purity", "purity"]
]);

const mirrored: Record<Comparator, Comparator> = {
    "<": ">",
    "<=": ">=",
    ">": "<",
    ">=": "<=",
    "==": "==",
    "!=": "!="
};

const tokenPattern = /\s*(?:(-?\d+(?:\.\d+)?)|(<=|>=|==|!=|<|>|=)|(&&|\|\|)|(!)|([()])|#([^\s()]+)|tag:([^\s()]+)|([A-Za-z_]\w*))/y;

export const tokenize = (source: string): Token[] => {
    const tokens: Token[] = [];
    tokenPattern.lastIndex = 0;
    let position = 0;

    while(position < source.length){
        if(source.slice(position).trim() === ""){
            break;
        }
        tokenPattern.lastIndex = position;
        const match = tokenPattern.exec(source);
        if(!match){
            throw new QueryError(`Unexpected character '${source.slice(position).trim()[0]}'`, position);
        }
        const start = position + match[0].length - match[0].trimStart().length;
        position = tokenPattern.lastIndex;

        const [, number, comparator, logical, bang, paren, hashTag, prefixedTag, word] = match;
        if(number !== undefined){
            tokens.push({type: "number", value: Number(number), position: start});
        }else if(comparator !== undefined){
            tokens.push({type: "comparator", value: comparator === "=" ? "==" : toComparator(comparator, start), position: start});
        }else if(logical !== undefined){
            tokens.push({type: logical === "&&" ? "and" : "or", position: start});
        }else if(bang !== undefined){
            tokens.push({type: "not", position: start});
        }else if(paren === "(" || paren === ")"){
            tokens.push({type: paren, position: start});
        }else if(hashTag !== undefined || prefixedTag !== undefined){
            tokens.push({type: "tag", value: (hashTag ?? prefixedTag ?? "").toLowerCase(), position: start});
        }else if(word !== undefined){
            const lower = word.toLowerCase();
            if(lower === "and" || lower === "or" || lower === "not"){
                tokens.push({type: lower, position: start});
            }else{
                tokens.push({type: "word", value: lower, position: start});
            }
        }
    }
    return tokens;
};

const toComparator = (value: string, position: number): Comparator => {
    switch(value){
        case "<":
        case "<=":
        case ">":
        case ">=":
        case "==":
        case "!=":
            return value;
        default:
            throw new QueryError(`Unknown comparator '${value}'`, position);
    }
};

class Parser {

    private index = 0;

    public constructor(private readonly tokens: Token[], private readonly length: number){ }

    public parse(): Predicate {
        const predicate = this.or();
        const rest = this.peek();
        if(rest){
            throw new QueryError(`Unexpected '${describeToken(rest)}'`, rest.position);
        }
        return predicate;
    }

    private peek(): Token | undefined {
        return this.tokens[this.index];
    }

    private take(): Token {
        const token = this.tokens[this.index];
        if(!token){
            throw new QueryError("Unexpected end of query", this.length);
        }
        this.index++;
        return token;
    }

    private or(): Predicate {
        let left = this.and();
        while(this.peek()?.type === "or"){
            this.index++;
            left = {kind: "or", left, right: this.and()};
        }
        return left;
    }

    private and(): Predicate {
        let left = this.unary();
        while(this.peek()?.type === "and"){
            this.index++;
            left = {kind: "and", left, right: this.unary()};
        }
        return left;
    }

    private unary(): Predicate {
        if(this.peek()?.type === "not"){
            this.index++;
            return {kind: "not", operand: this.unary()};
        }
        return this.primary();
    }

    private primary(): Predicate {
        const token = this.take();
        switch(token.type){
            case "(": {
                const inner = this.or();
                const closing = this.take();
                if(closing.type !== ")"){
                    throw new QueryError(`Expected ')' but found '${describeToken(closing)}'`, closing.position);
                }
                return inner;
            }
            case "tag":
                return {kind: "tag", tag: token.value};
            case "word": {
                if(token.value === "true" || token.value === "false"){
                    return {kind: "constant", value: token.value === "true"};
                }
                const attribute = attributes.get(token.value);
                if(!attribute){
                    throw new QueryError(`Unknown attribute '${token.value}'`, token.position);
                }
                const comparator = this.comparator();
                const value = this.take();
                if(value.type !== "number"){
                    throw new QueryError(`Expected a number but found '${describeToken(value)}'`, value.position);
                }
                return {kind: "compare", attribute, comparator, value: value.value};
            }
            case "number": {
                const comparator = this.comparator();
                const subject = this.take();
                const attribute = subject.type === "word" ? attributes.get(subject.value) : undefined;
                if(!attribute){
                    throw new QueryError(`Expected rating or purity but found '${describeToken(subject)}'`, subject.position);
                }
                return {kind: "compare", attribute, comparator: mirrored[comparator], value: token.value};
            }
            default:
                throw new QueryError(`Unexpected '${describeToken(token)}'`, token.position);
        }
    }

    private comparator(): Comparator {
        const token = this.take();
        if(token.type !== "comparator"){
            throw new QueryError(`Expected a comparison but found '${describeToken(token)}'`, token.position);
        }
        return token.value;
    }
}

const describeToken = (token: Token): string => {
    switch(token.type){
        case "number":
        case "word":
        case "comparator":
            return `${token.value}`;
        case "tag":
            return `#${token.value}`;
        default:
            return token.type;
    }
};

/** Parses a filter such as `r >= 1 and not #nsfw` into a predicate. */
export const parseQuery = (source: string): Predicate => {
    const tokens = tokenize(source);
    if(tokens.length === 0){
        return {kind: "constant", value: true};
    }
    return new Parser(tokens, source.length).parse();
};

const compare = (actual: number, comparator: Comparator, expected: number): boolean => {
    switch(comparator){
        case "<": return actual < expected;
        case "<=": return actual <= expected;
        case ">": return actual > expected;
        case ">=": return actual >= expected;
        case "==": return actual === expected;
        case "!=": return actual !== expected;
    }
};

export const matches = (predicate: Predicate, subject: Subject): boolean => {
    switch(predicate.kind){
        case "constant":
            return predicate.value;
        case "compare":
            return compare(subject[predicate.attribute], predicate.comparator, predicate.value);
        case "tag":
            return subject.tags.includes(predicate.tag);
        case "not":
            return !matches(predicate.operand, subject);
        case "and":
            return matches(predicate.left, subject) && matches(predicate.right, subject);
        case "or":
            return matches(predicate.left, subject) || matches(predicate.right, subject);
    }
};

export const formatQuery = (predicate: Predicate): string => {
    switch(predicate.kind){
        case "constant":
            return `${predicate.value}`;
        case "compare":
            return `${predicate.attribute} ${predicate.comparator} ${predicate.value}`;
        case "tag":
            return `#${predicate.tag}`;
        case "not":
            return `not ${wrap(predicate.operand)}`;
        case "and":
        case "or":
            return `${wrap(predicate.left)} ${predicate.kind} ${wrap(predicate.right)}`;
    }
};

const wrap = (predicate: Predicate): string =>
    predicate.kind === "and" || predicate.kind === "or" ? `(${formatQuery(predicate)})` : formatQuery(predicate);
