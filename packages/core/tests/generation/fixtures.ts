/** Model output for a two-waypoint mission; the second waypoint is the target. */
export function generatedMissionJson(waypoints = 2): string {
  const list = Array.from({ length: waypoints }, (_, i) => ({
    forward_image: {
      subject_description: i === waypoints - 1 ? 'A red brick cottage' : 'A grey concrete office block',
      environment_context: 'Quiet street',
      lighting_and_style: 'Morning light',
      landmarks: [
        {
          category: 'House_Number',
          name: 'house number',
          visual_attributes: 'white numbers on the porch',
          text_content: 10 + i,
          position: [0.4, 0.3],
        },
      ],
    },
    ground_image: { surface_texture: 'short grass', obstacles_and_debris: 'none', lighting_angle: 'overhead sun' },
    secondary_ground_image: null,
    ground_is_obstructed: false,
    is_target: i === waypoints - 1,
  }))
  return JSON.stringify({ mission_instruction: `Report detail at house number ${10 + waypoints - 1}.`, waypoints: list })
}
