import { RouteHandler } from '../types';
import { text } from './text';

export const profileAnalysisHandler: RouteHandler = {
  execute: () => ({
    message: 'Share the link to your LinkedIn profile or upload your resume and I will prepare a review of your headline, experience and skills.',
    followupIntent: 'profile_analysis',
    suggestedActions: ['Find job matches', 'Get skill recommendations'],
  }),
};

export const jobMatchingHandler: RouteHandler = {
  execute: (intent, context) => {
    const jobTitle = text(intent.entities.jobTitle) ?? text(context?.contextData.jobTitle);
    const location = text(intent.entities.location) ?? text(context?.contextData.jobLocation);
    if (!jobTitle) {
      return {
        message: 'What kind of role are you looking for?',
        followupIntent: 'job_matching',
        contextUpdates: location ? { jobLocation: location } : undefined,
      };
    }
    const where = location ? ` in ${location}` : '';
    return {
      message: `Searching for ${jobTitle} openings${where}. I'll send you the best matches.`,
      data: { jobTitle, ...(location ? { location } : {}) },
      suggestedActions: ['Analyze LinkedIn profile', 'Get skill recommendations'],
      contextUpdates: { jobTitle, ...(location ? { jobLocation: location } : {}) },
    };
  },
};

export const skillRecommendationHandler: RouteHandler = {
  execute: (intent, context) => {
    const skill = text(intent.entities.skill);
    const jobTitle = text(context?.contextData.jobTitle);
    const target = jobTitle ? ` for ${jobTitle} roles` : '';
    return {
      message: skill
        ? `${skill.charAt(0).toUpperCase()}${skill.slice(1)} is a good choice${target}. I'll suggest courses and certifications to get you started.`
        : `I'll put together a list of in-demand skills${target} based on your profile.`,
      data: skill ? { skill } : undefined,
      suggestedActions: ['Find job matches'],
    };
  },
};
