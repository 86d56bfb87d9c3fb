import { PLATFORM_MAX_POST_LENGTH } from "./utils/text.js";

// 정기 포스팅 프롬프트
export function buildScheduledPostPrompt(maxLength: number = PLATFORM_MAX_POST_LENGTH): string {
  return `Write one sharp tweet about the crypto market that investors and builders will want to argue about.

Pick ONE angle:
1. A recent price move in a major asset (BTC, ETH, ...)
2. A notable protocol or infrastructure upgrade
3. A regulatory development and who it affects
4. An institutional adoption signal
5. A DeFi mechanism, risk or opportunity

Be accurate, a little funny and a little contrarian. Use a concrete number when you have one.
Add 2-3 relevant hashtags. Stay under ${maxLength} characters.

Avoid filler such as "crypto is volatile"; give a specific, current observation.`;
}

export function buildMentionReplyPrompt(mentionText: string, maxLength: number = PLATFORM_MAX_POST_LENGTH): string {
  return `Someone mentioned you with: '${mentionText}'

Reply with an informed take on crypto or blockchain that answers what they actually said.

The reply should:
1. Be correct and specific
2. Carry a fact or data point where it helps
3. Take a clear position, even a contrarian one, while staying useful
4. Fit under ${maxLength} characters`;
}

export function buildDirectMessagePrompt(messageText: string): string {
  return `Someone sent you a direct message: '${messageText}'

Write a personal, helpful answer about crypto or blockchain that addresses their message.

The answer should:
1. Be correct and specific
2. Give practical next steps or resources when relevant
3. Sound friendly and conversational
4. End by inviting a follow-up question`;
}

export function buildSearchReplyPrompt(tweetText: string): string {
  return `You found this post through search: '${tweetText}'. Write a short, helpful comment about crypto or blockchain that engages with it.`;
}
