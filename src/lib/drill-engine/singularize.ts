/**
 * Heuristic singular form of a (plural) domain name. Only the last word changes:
 * "Greek Muses" -> "Greek Muse", "Categories" -> "Category", "People" -> "Person".
 */

const IRREGULAR_PLURALS: Record<string, string> = {
    people: 'person',
    children: 'child',
    men: 'man',
    women: 'woman',
    teeth: 'tooth',
    feet: 'foot',
    mice: 'mouse',
    geese: 'goose',
    oxen: 'ox',
};

const VOWELS = 'aeiou';

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1);
}

export function singularizeWord(word: string): string {
    const lower = word.toLowerCase();
    const irregular = IRREGULAR_PLURALS[lower];
    if (irregular !== undefined) {
        const first = word.charAt(0);
        return first !== first.toLowerCase() ? capitalize(irregular) : irregular;
    }

    if (word.endsWith('ies') && word.length > 3) {
        return word.slice(0, -3) + 'y';
    }
    if (word.endsWith('ves') && word.length > 3) {
        return word.slice(0, -3) + 'f';
    }
    if (word.endsWith('xes') && word.length > 3) {
        return word.slice(0, -2);
    }
    if (word.endsWith('ches') || word.endsWith('shes')) {
        return word.slice(0, -2);
    }
    if (word.endsWith('sses') && word.length > 4) {
        return word.slice(0, -2);
    }
    if (word.endsWith('ses') && word.length > 3 && !VOWELS.includes(word.charAt(word.length - 4).toLowerCase())) {
        return word.slice(0, -2);
    }
    if (word.endsWith('s') && !word.endsWith('ss')) {
        return word.slice(0, -1);
    }
    return word;
}

export function singularizeDomainName(domainName: string): string {
    const words = domainName.split(/\s+/).filter(w => w.length > 0);
    if (words.length === 0) {
        return domainName;
    }
    words[words.length - 1] = singularizeWord(words[words.length - 1]);
    return words.join(' ');
}
