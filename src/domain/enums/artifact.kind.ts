export const ArtifactKinds = [
    'input',
    'chunk',
    'transcript',
    'subtitle'
] as const;

export type ArtifactKind = typeof ArtifactKinds[number]
