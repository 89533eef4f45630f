import { describe, it, expect } from 'vitest';
import { extractQuotedTitle, titleTokens } from '../resolve/title.js';
import { resolveReference, scoreByTokenOverlap } from '../resolve/resolver.js';
import {
    buildReferenceMap,
    linkCitationMarkers,
    parseReferenceEntries,
    splitReferenceSection,
} from '../resolve/references.js';
import type { CandidateDocument, CandidatePools } from '../types/index.js';

function doc(number: number, name: string): CandidateDocument {
    const file = `${number}-${name}.pdf`;
    return { number, file, text: file };
}

describe('Title extraction', () => {
    it('should extract a straight-quoted title', () => {
        expect(extractQuotedTitle('[3] A. Author, "Multi-Cloud Drift Detection Techniques," 2021.'))
            .toBe('Multi-Cloud Drift Detection Techniques,');
    });

    it('should extract a curly-quoted title', () => {
        expect(extractQuotedTitle('B. Writer, “Policy as Code for Drift,” IEEE, 2022.')).toBe('Policy as Code for Drift,');
    });

    it('should prefer curly quotes over straight quotes', () => {
        expect(extractQuotedTitle('C. Dev, "Nickname" and “Real Title”')).toBe('Real Title');
    });

    it('should return null without quotes', () => {
        expect(extractQuotedTitle('D. Nobody, Untitled Report, 2020.')).toBeNull();
        expect(extractQuotedTitle('Empty "" quotes')).toBeNull();
    });

    it('should keep only tokens longer than four characters', () => {
        expect(titleTokens('Multi-Cloud Drift Detection Techniques,')).toEqual([
            'Multi', 'Cloud', 'Drift', 'Detection', 'Techniques',
        ]);
        expect(titleTokens('A new IaC tool for ops')).toEqual([]);
    });

    it('should keep accented letters inside tokens', () => {
        expect(titleTokens('Données hétérogènes,')).toEqual(['Données', 'hétérogènes']);
    });
});

describe('Reference Resolver', () => {
    const citation = '[3] A. Author, "Multi-Cloud Drift Detection Techniques," 2021.';

    it('should resolve through a metadata pool by title containment', () => {
        const pools: CandidatePools = {
            metadata: [[{ number: 3, title: 'Multi-Cloud Drift Detection Techniques' }]],
            documents: [doc(3, 'mcdd'), doc(7, 'other')],
        };
        expect(resolveReference(citation, pools)).toEqual({ document: doc(3, 'mcdd'), strategy: 'metadata' });
    });

    it('should match when the extracted title is contained in the known title', () => {
        const pools: CandidatePools = {
            metadata: [[{ number: 7, title: 'A Survey of Policy as Code for Drift, Extended Edition' }]],
            documents: [doc(7, 'pac')],
        };
        const link = resolveReference('B. Writer, “Policy as Code for Drift,” IEEE, 2022.', pools);
        expect(link?.document.number).toBe(7);
        expect(link?.strategy).toBe('metadata');
    });

    it('should prefer the higher-priority metadata pool', () => {
        const pools: CandidatePools = {
            metadata: [
                [{ number: 7, title: 'Multi-Cloud Drift Detection Techniques' }],
                [{ number: 3, title: 'Multi-Cloud Drift Detection Techniques' }],
            ],
            documents: [doc(3, 'a'), doc(7, 'b')],
        };
        expect(resolveReference(citation, pools)?.document.number).toBe(7);
    });

    it('should skip metadata entries without a document', () => {
        const pools: CandidatePools = {
            metadata: [
                [{ number: 99, title: 'Multi-Cloud Drift Detection Techniques' }],
                [{ number: 3, title: 'multi-cloud drift detection techniques' }],
            ],
            documents: [doc(3, 'a')],
        };
        expect(resolveReference(citation, pools)?.document.number).toBe(3);
    });

    it('should never match an empty metadata title', () => {
        const pools: CandidatePools = {
            metadata: [[{ number: 7, title: '' }]],
            documents: [doc(7, 'zzz')],
        };
        expect(resolveReference(citation, pools)).toBeNull();
    });

    it('should fall back to token overlap on document names', () => {
        const pools: CandidatePools = {
            metadata: [],
            documents: [doc(4, 'Drift Detection Survey'), doc(12, 'Configuration Drift in Terraform')],
        };
        const link = resolveReference('[5] C. Dev, "Detecting Configuration Drift in Terraform Deployments," 2020.', pools);
        expect(link).toEqual({
            document: doc(12, 'Configuration Drift in Terraform'),
            strategy: 'token-overlap',
            score: 3,
        });
    });

    it('should break token-overlap ties by lowest document number', () => {
        const pools: CandidatePools = {
            metadata: [],
            documents: [doc(9, 'terraform drift study'), doc(2, 'drift in terraform')],
        };
        const link = resolveReference('E. Ops, "Terraform Drift Handling," 2023.', pools);
        expect(link?.document.number).toBe(2);
        expect(link?.score).toBe(2);
    });

    it('should resolve titles with accented words by token overlap', () => {
        const pools: CandidatePools = { metadata: [], documents: [doc(3, 'drift methods'), doc(7, 'Données hétérogènes')] };
        expect(resolveReference('X, "Données hétérogènes," 2020.', pools)).toEqual({
            document: doc(7, 'Données hétérogènes'),
            strategy: 'token-overlap',
            score: 2,
        });
    });

    it('should leave a citation unresolved when only one token matches', () => {
        const pools: CandidatePools = { metadata: [], documents: [doc(1, 'drift methods')] };
        expect(resolveReference('F. Q., "Quantum Drift Annealing," 2019.', pools)).toBeNull();
    });

    it('should honour a lower minimum token count', () => {
        const pools: CandidatePools = { metadata: [], documents: [doc(1, 'drift methods')] };
        const link = resolveReference('F. Q., "Quantum Drift Annealing," 2019.', pools, { minTokenMatches: 1 });
        expect(link).toEqual({ document: doc(1, 'drift methods'), strategy: 'token-overlap', score: 1 });
    });

    it('should leave a citation without a quoted title unresolved', () => {
        const pools: CandidatePools = {
            metadata: [[{ number: 3, title: 'Multi-Cloud Drift Detection Techniques' }]],
            documents: [doc(3, 'Multi-Cloud Drift Detection Techniques')],
        };
        expect(resolveReference('[3] A. Author, Multi-Cloud Drift Detection Techniques, 2021.', pools)).toBeNull();
    });

    describe('scoreByTokenOverlap', () => {
        it('should return null for no tokens', () => {
            expect(scoreByTokenOverlap([], [doc(1, 'x')], 0)).toBeNull();
        });

        it('should match tokens case-insensitively', () => {
            const best = scoreByTokenOverlap(['DRIFT', 'Terraform'], [doc(5, 'drift-terraform')], 2);
            expect(best).toEqual({ document: doc(5, 'drift-terraform'), score: 2 });
        });
    });
});

describe('Reference list', () => {
    it('should split off the reference section', () => {
        const content = 'Intro cites [1].\n8. References\n[1] A, "T1".\n[2] B';
        expect(splitReferenceSection(content, '\\d+\\.\\s+References')).toBe('[1] A, "T1".\n[2] B');
        expect(splitReferenceSection('No list here', '\\d+\\.\\s+References')).toBeNull();
    });

    it('should parse numbered entries across lines', () => {
        const section = '[1] A. One, "First Title,"\n  2020.\n[2] B. Two, "Second"';
        expect(parseReferenceEntries(section)).toEqual([
            { number: 1, text: 'A. One, "First Title," 2020.' },
            { number: 2, text: 'B. Two, "Second"' },
        ]);
    });

    it('should build a map of resolved entries only', () => {
        const pools: CandidatePools = {
            metadata: [],
            documents: [doc(3, 'Multi-Cloud Drift Detection Techniques')],
        };
        const links = buildReferenceMap(
            [
                { number: 1, text: 'A. Author, "Multi-Cloud Drift Detection Techniques," 2021.' },
                { number: 2, text: 'B. Writer, "Unrelated Quantum Annealing," 2019.' },
            ],
            pools
        );
        expect([...links.keys()]).toEqual([1]);
        expect(links.get(1)?.document.number).toBe(3);
    });

    it('should link resolved markers and leave others as written', () => {
        const links = new Map([[1, { document: doc(1, 'a'), strategy: 'metadata' as const }]]);
        const line = linkCitationMarkers('See [1] and [2], also [10].', links, (n, link) => `<${n}:${link.document.file}>`);
        expect(line).toBe('See <1:1-a.pdf> and [2], also [10].');
    });
});
