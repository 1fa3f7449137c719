import { SectionBuilder, type RouteHandler } from './section.js';

export function capabilitiesOverview(userRequest: string): string {
  return `## 🤖 Multi-capability Assistant

You said: "${userRequest}"

No conversational model is configured, but these capabilities can still be used directly:

### 🛠️ What I Can Do
- **🐙 Repositories:** "create repository my-project", "list my repositories", "create branch feature-x in my-project"
- **💻 Code:** "generate a python function that parses CSV", "explain this code" with a fenced block
- **📋 Planning:** "plan a product launch", "break down the migration into steps"
- **🗄️ Database:** "connect to the database", "show me all users from the database"
- **🔄 Workflows:** "automate a workflow that creates a repo and plans the first sprint"`;
}

export const handleConversation: RouteHandler = async (ctx) => {
  const section = new SectionBuilder(ctx.invocation);
  const chat = ctx.registry.get('general_conversation');

  if (!chat.isAvailable()) {
    return section.write(capabilitiesOverview(ctx.request.userRequest)).build();
  }

  const outcome = await section.invoke(chat, {
    operation: 'chat',
    message: ctx.request.userRequest,
    history: ctx.history,
  });

  if (outcome.success) {
    section.write(outcome.payload.reply);
  } else {
    section.fail('Chat', outcome.error);
  }
  return section.build();
};
