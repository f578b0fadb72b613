import type { FeatureName } from "@/memory/types";

// JS `\b` and `\w` only know ASCII; Hangul needs Unicode-aware versions.
const WORD_CHAR = String.raw`[\p{L}\p{M}\p{N}_]`;
const WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;

export function unicodePattern(source: string, flags = "i"): RegExp {
  const expanded = source.replaceAll(String.raw`\b`, WORD_BOUNDARY).replaceAll(String.raw`\w`, WORD_CHAR);
  return new RegExp(expanded, `u${flags}`);
}

const TEMPORAL = [
  String.raw`\b(?:오늘|어제|내일|지금|현재|방금|아까|나중에)|\b(?:today|yesterday|tomorrow|tonight|now|earlier|later)\b`,
  String.raw`\b(?:\d{1,2}시|\d{1,2}분|아침|점심|저녁|밤)|\b(?:morning|afternoon|evening|noon|midnight|\d{1,2}(?::\d{2})?\s?[ap]m)\b`,
  String.raw`\b(?:월요일|화요일|수요일|목요일|금요일|토요일|일요일|주말)|\b(?:monday|tuesday|wednesday|thursday|friday|saturday|sunday|weekend)s?\b`,
  String.raw`\b(?:\d{4}년|\d{1,2}월|\d{1,2}일)|\b(?:last|next|this)\s+(?:week|month|year)\b`,
  String.raw`\b(?:최근|이전|동안|때)(?:에|엔|에는|의)?\b|\b(?:전에|후에)\b|\b(?:recently|ago|during|while)\b`,
];

const EMOTIONAL = [
  String.raw`\b(?:기쁘|기뻐|행복|즐거|신나|좋|만족|감사)\w*|\b(?:happy|glad|joyful|excited|grateful|thankful|pleased)\b`,
  String.raw`\b(?:슬프|슬퍼|우울|힘들|아프|괴로|답답|속상)\w*|\b(?:sad|depressed|upset|lonely|miserable|hurt)\b`,
  String.raw`\b(?:화나|화가|짜증|분노|열받|빡치|스트레스)\w*|\b(?:angry|mad|annoyed|furious|stressed|frustrated)\b`,
  String.raw`\b(?:불안|걱정|두려|무서|긴장|초조)\w*|\b(?:anxious|worried|afraid|scared|nervous)\b`,
  String.raw`\b(?:피곤|지치|지쳐|컨디션|몸살)\w*|\b(?:tired|exhausted|sick|sleepy)\b`,
  String.raw`\b(?:재밌|재미있|웃겨|놀라|신기|대박)\w*|\b(?:fun|funny|amazing|surprised|wow)\b`,
];

const CONVERSATIONAL = [
  String.raw`\b(?:말했|얘기했|대화했|이야기했|물어봤|답했)\w*|\b(?:said|told|asked|answered|replied|talked|mentioned)\b`,
  String.raw`(?<=\w)(?:라고|다고|냐고|자고|거든요?|잖아요?)\b|\b(?:you know|i mean|by the way)\b`,
  String.raw`ㅋㅋ|ㅎㅎ|ㅠㅠ|ㅜㅜ|\?!|!{2,}|\.{3,}|\b(?:lol|haha)\b`,
];

const FACTUAL = [
  String.raw`(?<=\w)(?:이다|입니다|됩니다|이었다|였다)\b|\b(?:is|are|was|were)\s+(?:a|an|the)\b`,
  String.raw`\b(?:정보|사실|지식|개념|정의|설명)|\b(?:fact|facts|information|definition|concept|means|defined)\b`,
  String.raw`\b(?:명사|동사|형용사|부사|문법|규칙|공식)|\b(?:noun|verb|grammar|rule|formula)s?\b`,
  String.raw`\b(?:역사|과학|수학|기술|정치|경제|수도|인구)|\b(?:history|science|math|mathematics|technology|politics|economy|capital|population)\b`,
  String.raw`\b\d+(?:\.\d+)?\s?(?:%|개|명|원|kg|cm|km|g)(?!\w)|\b\d+(?:\.\d+)?\s?(?:percent|people|dollars)\b`,
];

const PROFILE = [
  String.raw`\b(?:생일|나이|직업|취미|좋아하|싫어하|전공)\w*|\b(?:birthday|age|job|occupation|hobby|hobbies|major|favorite|favourite)\b`,
  String.raw`\b(?:살고|거주|주소|집|가족|부모|형제|자매)\w*|\b(?:lives|lived|address|home|family|parents|brother|sister)\b`,
  String.raw`\b(?:이름|성격|특징|습관|버릇|취향)\w*|\b(?:name|personality|habit|habits|prefer|prefers)\b`,
  String.raw`\b(?:전화|연락|메일|이메일|계정)\w*|\b(?:sns|phone|email|e-mail|account|contact)\b`,
];

export const FEATURE_PATTERNS: Readonly<Record<FeatureName, readonly RegExp[]>> = Object.freeze({
  temporal: TEMPORAL.map((source) => unicodePattern(source)),
  emotional: EMOTIONAL.map((source) => unicodePattern(source)),
  conversational: CONVERSATIONAL.map((source) => unicodePattern(source)),
  factual: FACTUAL.map((source) => unicodePattern(source)),
  profile: PROFILE.map((source) => unicodePattern(source)),
});

export const FEATURE_NAMES: readonly FeatureName[] = ["temporal", "emotional", "conversational", "factual", "profile"];

export const INTERROGATIVE_LEXEME = unicodePattern(
  String.raw`뭐|무엇|어떻|어떤|언제|어디|왜|누구|어느|몇|\b(?:what|when|where|why|who|whom|which|how)\b`,
);

export const INTERROGATIVE_ENDING = /[?？]$/u;

export const DECLARATIVE_ENDING = /(?:이다|입니다|됩니다|다)$/u;
