/**
 * Cover Letter Prompt
 *
 * Embeds the resolved inputs in a fixed instruction template. Each document
 * is delimited by triple backticks so the model can tell them apart.
 */

import type { GenerationRequest } from '../types'

const FENCE = '```'

/**
 * Build the generation prompt for a request.
 */
export function buildCoverLetterPrompt(request: GenerationRequest): string {
  const { resume, referenceCoverLetter, jobDescription, remarks } = request

  return `Perform the following actions:
1 - Summarize the requirements for the following job description delimited by triple backticks.
Job description: ${FENCE}${jobDescription}${FENCE}

2 - Extract skills and experience relevant to the job description from the resume delimited by triple backticks, extract skills and experiences from the job description.
Resume: ${FENCE}${resume}${FENCE}

3 - Summarize relevant information from the following cover letter delimited by triple backticks.
Reference cover letter: ${FENCE}${referenceCoverLetter}${FENCE}

4 - Output a cover letter for the summarized job description in a professional and conversational tone. Format your response to be consistent with the reference cover letter.

The cover letter is intended for a hiring manager, so it should focus on matching qualifications from the summarized resume and the cover letter to the job description provided.

Qualifications should be presented using the "show, don't tell" technique.

Try to establish a relationship between my experiences and the job.

Keep in mind that ${remarks}.
`
}
