/**
 * Drill Engine - Question Generator
 *
 * Multiple-choice questions that connect two distinct fields of one fact:
 * the context field is shown, the quiz field is asked for. Distractors come
 * from the same field of other facts in the domain.
 */

import {
    AnswerEvaluation,
    BuiltQuestion,
    DEFAULT_DRILL_CONFIG,
    Domain,
    DrillEngineConfig,
    Fact,
    QuestionPayload,
    RandomSource,
} from './types';
import { ValidationFailureError } from './errors';
import { defaultRandom, pickRandom, sample, shuffle } from './random';
import { singularizeDomainName } from './singularize';

export interface FieldPair {
    contextField: string;
    quizField: string;
}

export function questionKey(factId: string, contextField: string, quizField: string): string {
    return `${factId}:${contextField}:${quizField}`;
}

function factFields(fact: Fact): string[] {
    return Object.keys(fact.values);
}

// =============================================================================
// FIELD PAIRS
// =============================================================================

/**
 * Two distinct fields of the fact, chosen uniformly
 */
export function selectFieldPair(fact: Fact, random: RandomSource = defaultRandom): FieldPair {
    const fields = factFields(fact);
    if (fields.length < 2) {
        throw new ValidationFailureError(`Fact ${fact.id} needs at least 2 fields for quizzing`, {
            factId: fact.id,
            fieldCount: fields.length,
        });
    }

    const contextField = pickRandom(random, fields) ?? fields[0];
    const remaining = fields.filter(f => f !== contextField);
    const quizField = pickRandom(random, remaining) ?? remaining[0];
    return { contextField, quizField };
}

/**
 * Retry pair selection until its key differs from the previous question's.
 * The last candidate is accepted when every try collides.
 */
export function chooseFieldPair(
    fact: Fact,
    lastQuestionKey: string | null,
    random: RandomSource = defaultRandom,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): FieldPair {
    const retries = config.questions.fieldPairRetries;
    let candidate = selectFieldPair(fact, random);

    for (let attempt = 1; attempt < retries; attempt++) {
        if (questionKey(fact.id, candidate.contextField, candidate.quizField) !== lastQuestionKey) {
            return candidate;
        }
        candidate = selectFieldPair(fact, random);
    }
    return candidate;
}

// =============================================================================
// QUESTION TEXT
// =============================================================================

export function phraseQuestion(domain: Domain, contextField: string, quizField: string, contextValue: string): string {
    const identifyingField = domain.fieldNames[0];

    if (contextField === identifyingField) {
        return `What is the ${quizField} of ${contextValue}?`;
    }

    const singular = singularizeDomainName(domain.name).toLowerCase();
    if (quizField === identifyingField) {
        return `Which ${singular} has ${contextValue} as their ${contextField}?`;
    }
    return `What is the ${quizField} of the ${singular} with ${contextField} = ${contextValue}?`;
}

// =============================================================================
// BUILD
// =============================================================================

export function buildQuestion(
    fact: Fact,
    contextField: string,
    quizField: string,
    allFacts: readonly Fact[],
    domain: Domain,
    random: RandomSource = defaultRandom,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): BuiltQuestion {
    const fields = factFields(fact);
    if (fields.length < 2) {
        throw new ValidationFailureError(`Fact ${fact.id} needs at least 2 fields for quizzing`, {
            factId: fact.id,
            fieldCount: fields.length,
        });
    }
    if (contextField === quizField) {
        throw new ValidationFailureError('Context and quiz field must differ', { factId: fact.id, field: quizField });
    }

    const contextValue = fact.values[contextField];
    const correctAnswer = fact.values[quizField];
    if (contextValue === undefined || correctAnswer === undefined) {
        throw new ValidationFailureError(`Fact ${fact.id} is missing a quizzed field`, {
            factId: fact.id,
            contextField,
            quizField,
        });
    }

    const distractorCount = config.questions.optionCount - 1;

    const wrongAnswers: string[] = [];
    for (const other of allFacts) {
        if (other.id === fact.id) continue;
        const value = other.values[quizField];
        if (value !== undefined && value !== correctAnswer && !wrongAnswers.includes(value)) {
            wrongAnswers.push(value);
        }
    }

    let distractors = wrongAnswers.length > distractorCount
        ? sample(random, wrongAnswers, distractorCount)
        : wrongAnswers;

    let n = distractors.length + 1;
    while (distractors.length < distractorCount) {
        const placeholder = `${config.questions.placeholderPrefix} ${n}`;
        if (placeholder !== correctAnswer && !distractors.includes(placeholder)) {
            distractors = [...distractors, placeholder];
        }
        n++;
    }

    const options = shuffle(random, [correctAnswer, ...distractors]);

    return {
        questionText: phraseQuestion(domain, contextField, quizField, contextValue),
        options,
        correctIndex: options.indexOf(correctAnswer),
        correctAnswer,
    };
}

/**
 * Pick a non-repeating field pair and build the question for one fact
 */
export function prepareQuestionForFact(
    fact: Fact,
    allFacts: readonly Fact[],
    domain: Domain,
    lastQuestionKey: string | null,
    random: RandomSource = defaultRandom,
    config: DrillEngineConfig = DEFAULT_DRILL_CONFIG
): QuestionPayload {
    const { contextField, quizField } = chooseFieldPair(fact, lastQuestionKey, random, config);
    const built = buildQuestion(fact, contextField, quizField, allFacts, domain, random, config);

    return {
        ...built,
        factId: fact.id,
        contextField,
        quizField,
        questionKey: questionKey(fact.id, contextField, quizField),
    };
}

// =============================================================================
// ANSWERS
// =============================================================================

/**
 * Compare by value. A different selection still counts when another fact
 * shares the question's context value and holds the selected quiz value.
 */
export function evaluateAnswer(
    question: QuestionPayload,
    selectedIndex: number,
    allFacts: readonly Fact[]
): AnswerEvaluation {
    const selectedAnswer = question.options[selectedIndex];
    if (!Number.isInteger(selectedIndex) || selectedAnswer === undefined) {
        throw new ValidationFailureError('Selected option is out of range', {
            selectedIndex,
            optionCount: question.options.length,
        });
    }

    if (selectedAnswer === question.correctAnswer) {
        return { correct: true, selectedAnswer, acceptedAlternative: false };
    }

    const target = allFacts.find(f => f.id === question.factId);
    const contextValue = target?.values[question.contextField];

    const alternative = contextValue !== undefined && allFacts.some(other =>
        other.id !== question.factId &&
        other.values[question.contextField] === contextValue &&
        other.values[question.quizField] === selectedAnswer
    );

    return { correct: alternative, selectedAnswer, acceptedAlternative: alternative };
}
