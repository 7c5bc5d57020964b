/**
 * Tokenizer for code and prose.
 *
 * - lower-cases
 * - splits on anything that is not a letter, digit, underscore or inner dot
 * - keeps identifiers like `bar_baz` whole
 * - dotted identifiers (`foo.bar_baz`) yield every part plus the compound
 *
 * Parts of a dotted identifier take consecutive positions. The compound
 * shares the position of its first part, so phrase adjacency is the same
 * whether or not a query names the compound.
 */

export type Term = string;

export interface Token {
	term: Term;
	/** 0-based token position */
	position: number;
	/** Character offsets into the source text, [start, end) */
	start: number;
	end: number;
	/** True for the whole `a.b.c` form of a dotted identifier */
	compound: boolean;
}

const WORD_PATTERN = /[\p{L}\p{N}_]+(?:\.[\p{L}\p{N}_]+)*/gu;

export class Tokenizer {
	/**
	 * Tokenize text. Deterministic for a given input.
	 */
	tokenize(text: string): Token[] {
		const tokens: Token[] = [];
		let position = 0;

		for (const match of text.matchAll(WORD_PATTERN)) {
			const word = match[0];
			const start = match.index ?? 0;

			if (!word.includes('.')) {
				tokens.push({
					term: word.toLowerCase(),
					position,
					start,
					end: start + word.length,
					compound: false,
				});
				position++;
				continue;
			}

			const first = position;
			let offset = start;
			for (const part of word.split('.')) {
				tokens.push({
					term: part.toLowerCase(),
					position,
					start: offset,
					end: offset + part.length,
					compound: false,
				});
				position++;
				offset += part.length + 1;
			}
			tokens.push({
				term: word.toLowerCase(),
				position: first,
				start,
				end: start + word.length,
				compound: true,
			});
		}

		return tokens;
	}

	/**
	 * Terms a bare query word stands for. A word that is one dotted
	 * identifier maps to its compound; anything else maps to its parts.
	 */
	queryTerms(word: string): Term[] {
		const tokens = this.tokenize(word);
		const compounds = tokens.filter(token => token.compound);
		const parts = tokens.filter(token => !token.compound);
		const [only] = compounds;
		if (
			compounds.length === 1 &&
			only &&
			parts.every(part => part.start >= only.start && part.end <= only.end)
		) {
			return [only.term];
		}
		return parts.map(part => part.term);
	}

	/**
	 * Terms of a phrase, one per position.
	 */
	phraseTerms(text: string): Term[] {
		return this.tokenize(text)
			.filter(token => !token.compound)
			.map(token => token.term);
	}

	/**
	 * Number of positions in a text.
	 */
	countPositions(text: string): number {
		let count = 0;
		for (const token of this.tokenize(text)) {
			if (!token.compound) count++;
		}
		return count;
	}
}
